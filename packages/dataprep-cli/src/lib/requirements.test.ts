import { describe, it, expect } from "vitest";
import { checkRequirements, verifyRequirements } from "./requirements.js";
import { createMemoryLogger } from "./logger.js";
import { isCLIErrorCode } from "./errors/types.js";
import type { ExecutableResolver } from "./ports/executable-resolver.js";

function fakeResolver(installed: Record<string, string>): ExecutableResolver & { asked: string[] } {
  const asked: string[] = [];
  return {
    asked,
    async resolve(name: string) {
      asked.push(name);
      return installed[name];
    },
  };
}

describe("checkRequirements", () => {
  it("reports the path of found executables and omits it for missing ones", async () => {
    const resolver = fakeResolver({ python3: "/usr/bin/python3" });

    const checks = await checkRequirements(["python3", "pip"], resolver);

    expect(checks).toEqual([
      { name: "python3", path: "/usr/bin/python3" },
      { name: "pip" },
    ]);
  });
});

describe("verifyRequirements", () => {
  it("resolves every executable when all are present", async () => {
    const resolver = fakeResolver({ python3: "/usr/bin/python3", pip: "/usr/bin/pip" });
    const logger = createMemoryLogger();

    const checks = await verifyRequirements(["python3", "pip"], resolver, logger);

    expect(checks).toEqual([
      { name: "python3", path: "/usr/bin/python3" },
      { name: "pip", path: "/usr/bin/pip" },
    ]);
    expect(logger.entries).toEqual([
      { level: "debug", message: "Found python3", path: "/usr/bin/python3" },
      { level: "debug", message: "Found pip", path: "/usr/bin/pip" },
    ]);
  });

  it("fails on the first missing executable and names it", async () => {
    const resolver = fakeResolver({ python3: "/usr/bin/python3" });

    const error = await verifyRequirements(
      ["pip", "python3"],
      resolver,
      createMemoryLogger()
    ).catch((e: unknown) => e);

    expect(isCLIErrorCode(error, "PREREQ_MISSING")).toBe(true);
    expect(error).toHaveProperty("message", '"pip" is not installed or not on PATH');
    expect(resolver.asked).toEqual(["pip"]);
  });

  it("accepts an empty requirement list", async () => {
    const resolver = fakeResolver({});

    await expect(verifyRequirements([], resolver, createMemoryLogger())).resolves.toEqual([]);
    expect(resolver.asked).toEqual([]);
  });
});
