export enum ErrorCode {
  // Config errors
  CONFIG_NOT_FOUND = "CONFIG_NOT_FOUND",
  CONFIG_PARSE_FAILED = "CONFIG_PARSE_FAILED",

  // Art / asset errors
  FILE_READ_FAILED = "FILE_READ_FAILED",
  PARSE_FAILED = "PARSE_FAILED",

  // Image mode
  IMAGE_UNSUPPORTED = "IMAGE_UNSUPPORTED",

  // Probes
  PROBE_FAILED = "PROBE_FAILED",

  // Validation
  VALIDATION_FAILED = "VALIDATION_FAILED",
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
}

export interface AppError {
  code: ErrorCode;
  message: string;
  cause?: unknown;
}

export const buildError = (
  code: ErrorCode,
  message: string,
  cause?: unknown,
): AppError => ({
  code,
  message,
  cause,
});
