import { readFileSync } from "fs";

let cached: string | undefined;

/**
 * Version from the package manifest, which sits two levels above this file
 * both in src/ and in the compiled dist/.
 */
export function getCliVersion(): string {
  if (cached === undefined) {
    const manifest: unknown = JSON.parse(
      readFileSync(new URL("../../package.json", import.meta.url), "utf-8")
    );
    cached =
      typeof manifest === "object" && manifest !== null && "version" in manifest &&
      typeof manifest.version === "string"
        ? manifest.version
        : "0.0.0";
  }
  return cached;
}
