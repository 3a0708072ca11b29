/**
 * File identity utilities: existence, size, mtime and content digests of
 * downloaded files.
 */

import { createHash } from "crypto";
import { createReadStream } from "fs";
import { stat } from "fs/promises";
import type { FileIdentity } from "./json-output.js";

function isMissingError(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false;
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}

/**
 * True when path exists and is a regular file.
 * A missing path (or a missing parent) is false; other errors propagate.
 */
export async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (isMissingError(error)) return false;
    throw error;
  }
}

/**
 * Get file identity information, or undefined when the file is absent.
 */
export async function getFileIdentity(filePath: string): Promise<FileIdentity | undefined> {
  let stats;
  try {
    stats = await stat(filePath);
  } catch (error) {
    if (isMissingError(error)) return undefined;
    throw error;
  }
  if (!stats.isFile()) return undefined;

  return {
    path: filePath,
    size: stats.size,
    mtime: stats.mtime.toISOString(),
  };
}

/**
 * Compute the hex digest of a file, streaming its content.
 */
export async function computeFileHash(filePath: string, algorithm = "sha256"): Promise<string> {
  const hash = createHash(algorithm);
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}
