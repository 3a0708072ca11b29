/**
 * Documents printed in `--json` mode. Each command writes exactly one of
 * them: a success document on stdout or an error document on stderr.
 */

import { isJsonMode } from "./cli-context.js";
import { CLIError } from "./errors/types.js";

/** A file on disk as `doctor` reports it. */
export interface FileIdentity {
  path: string;
  size: number;
  /** ISO 8601 */
  mtime: string;
}

export interface JsonSuccess<T> {
  success: true;
  data: T;
}

export interface JsonError {
  success: false;
  error: {
    code: string;
    message: string;
    suggestion?: string;
    details?: string;
  };
}

export type CheckStatus = "pass" | "fail" | "warn";

/** `data` of `dataprep doctor --json`. */
export interface DoctorResultJson {
  checks: Array<{
    name: string;
    status: CheckStatus;
    message: string;
    details?: string;
  }>;
  system: {
    os: string;
    nodeVersion: string;
    cliVersion: string;
  };
  dataDir: string;
}

export function outputSuccess<T>(data: T): void {
  const result: JsonSuccess<T> = { success: true, data };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Errors that are not a CLIError are reported as UNKNOWN_ERROR with their
 * message only.
 */
export function outputError(error: CLIError | Error): void {
  const body: JsonError["error"] = {
    code: error instanceof CLIError ? error.code : "UNKNOWN_ERROR",
    message: error.message,
  };
  if (error instanceof CLIError) {
    if (error.suggestion) body.suggestion = error.suggestion;
    if (error.details) body.details = error.details;
  }
  const result: JsonError = { success: false, error: body };
  console.error(JSON.stringify(result, null, 2));
}

/**
 * In JSON mode print `data` as the command's result and return true.
 * Otherwise print nothing and return false, leaving the human output to the
 * caller.
 */
export function maybeOutputJson<T>(data: T): boolean {
  if (!isJsonMode()) return false;
  outputSuccess(data);
  return true;
}
