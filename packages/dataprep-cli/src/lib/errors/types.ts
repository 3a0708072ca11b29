/**
 * Error codes for all CLI error types.
 * Each code maps to a specific failure of a setup run.
 */
export type ErrorCode =
  // Prerequisite errors
  | "PREREQ_MISSING"
  // Filesystem errors
  | "DIR_CREATE_FAILED"
  // Download errors
  | "DOWNLOAD_FAILED"
  | "DOWNLOAD_HTTP_ERROR"
  | "DOWNLOAD_INCOMPLETE"
  | "DOWNLOAD_SIZE_MISMATCH"
  | "DOWNLOAD_CHECKSUM_MISMATCH"
  // Archive errors
  | "ARCHIVE_UNSAFE_PATH"
  | "EXTRACT_FAILED"
  // Installer errors
  | "INSTALL_FAILED"
  // Validation errors
  | "VALIDATION_CONFIG_INVALID"
  // Generic
  | "UNKNOWN_ERROR";

/**
 * Extended Error class for CLI-specific errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      example?: string;
      details?: string;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.details = options?.details;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

/**
 * Check whether an error is a CLIError carrying the given code.
 */
export function isCLIErrorCode(error: unknown, code: ErrorCode): error is CLIError {
  return isCLIError(error) && error.code === code;
}
