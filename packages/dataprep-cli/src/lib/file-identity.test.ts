import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, utimesSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { computeFileHash, getFileIdentity, isRegularFile } from "./file-identity.js";

describe("file-identity", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "dataprep-identity-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reports path, size and mtime of a downloaded file", async () => {
    const file = join(dir, "dev.jsonl");
    writeFileSync(file, "hello");
    const mtime = new Date("2024-03-01T12:00:00.000Z");
    utimesSync(file, mtime, mtime);

    expect(await getFileIdentity(file)).toEqual({
      path: file,
      size: 5,
      mtime: "2024-03-01T12:00:00.000Z",
    });
  });

  it("returns undefined for a missing file, a missing parent or a directory", async () => {
    mkdirSync(join(dir, "glove"));

    expect(await getFileIdentity(join(dir, "absent.jsonl"))).toBeUndefined();
    expect(await getFileIdentity(join(dir, "absent", "dev.jsonl"))).toBeUndefined();
    expect(await getFileIdentity(join(dir, "glove"))).toBeUndefined();
  });

  it("treats only regular files as present", async () => {
    writeFileSync(join(dir, "train.jsonl"), "");
    mkdirSync(join(dir, "boolq"));

    expect(await isRegularFile(join(dir, "train.jsonl"))).toBe(true);
    expect(await isRegularFile(join(dir, "boolq"))).toBe(false);
    expect(await isRegularFile(join(dir, "missing"))).toBe(false);
  });

  it("computes the sha256 of a file", async () => {
    const file = join(dir, "hello.txt");
    writeFileSync(file, "hello");

    expect(await computeFileHash(file)).toBe(
      "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824"
    );
  });
});
