import { CLIError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 */

// ============================================================================
// Prerequisite Errors
// ============================================================================

export function prerequisiteMissing(name: string): CLIError {
  return new CLIError("PREREQ_MISSING", `"${name}" is not installed or not on PATH`, {
    suggestion: `Install ${name} and make sure your shell can find it`,
    example: `command -v ${name}`,
  });
}

// ============================================================================
// Filesystem Errors
// ============================================================================

export function directoryCreateFailed(path: string, cause: unknown): CLIError {
  const err = cause instanceof Error ? cause : undefined;
  return new CLIError("DIR_CREATE_FAILED", `Can't create directory "${path}"`, {
    suggestion: "Check permissions and free disk space",
    details: err?.message,
    cause: err,
  });
}

// ============================================================================
// Download Errors
// ============================================================================

export function downloadFailed(url: string, cause?: unknown): CLIError {
  const err = cause instanceof Error ? cause : undefined;
  return new CLIError("DOWNLOAD_FAILED", `Can't download ${url}`, {
    suggestion: "Check your network connection and run the command again",
    details: err?.message,
    cause: err,
  });
}

export function downloadHttpError(url: string, status: number, statusText: string): CLIError {
  return new CLIError("DOWNLOAD_HTTP_ERROR", `Server answered ${status} ${statusText}`.trim(), {
    suggestion: "The file may have moved. Override its URL in the config file",
    details: url,
  });
}

export function downloadIncomplete(url: string, received: number, expected: number): CLIError {
  return new CLIError("DOWNLOAD_INCOMPLETE", `Download ended early (${received} of ${expected} bytes)`, {
    suggestion: "Run the command again to retry the missing file",
    details: url,
  });
}

export function sizeMismatch(path: string, actual: number, expected: number): CLIError {
  return new CLIError("DOWNLOAD_SIZE_MISMATCH", `"${path}" is ${actual} bytes, expected ${expected}`, {
    suggestion: "The file was removed. Run the command again to fetch it",
  });
}

export function checksumMismatch(path: string, actual: string, expected: string): CLIError {
  return new CLIError("DOWNLOAD_CHECKSUM_MISMATCH", `Checksum of "${path}" does not match`, {
    suggestion: "The file was removed. Run the command again to fetch it",
    details: `expected sha256 ${expected}, got ${actual}`,
  });
}

// ============================================================================
// Archive Errors
// ============================================================================

export function unsafeArchivePath(archive: string, entryName: string): CLIError {
  return new CLIError("ARCHIVE_UNSAFE_PATH", `Archive entry "${entryName}" points outside the target directory`, {
    suggestion: "The archive was not extracted. Verify where it came from",
    details: archive,
  });
}

export function extractFailed(archive: string, cause: unknown): CLIError {
  const err = cause instanceof Error ? cause : undefined;
  return new CLIError("EXTRACT_FAILED", `Can't extract "${archive}"`, {
    suggestion: "Delete the archive and run the command again to fetch a fresh copy",
    details: err?.message ?? String(cause),
    cause: err,
  });
}

// ============================================================================
// Installer Errors
// ============================================================================

export function installFailed(command: string, exitCode?: number, cause?: unknown): CLIError {
  const err = cause instanceof Error ? cause : undefined;
  const reason = exitCode !== undefined ? `exited with code ${exitCode}` : "could not be started";
  return new CLIError("INSTALL_FAILED", `"${command}" ${reason}`, {
    suggestion: "Install the language model by hand, or rerun with --skip-install",
    example: command,
    details: err?.message,
    cause: err,
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    example: `dataprep config validate -c ${path}`,
    details,
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;
  return new CLIError("UNKNOWN_ERROR", message, { cause });
}
