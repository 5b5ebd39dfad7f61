export type DataUriErrorCode =
  | "INVALID_PROTOCOL"
  | "INVALID_MIME_TYPE"
  | "MISSING_COMMA"
  | "INVALID_BASE64"
  | "UNSUPPORTED_CHARSET"
  | "INVALID_PERCENT_ENCODING"
  | "IO_FAILURE";

/**
 * Error raised by every parse, format and build operation of this package
 */
export class DataUriError extends Error {
  constructor(
    message: string,
    public readonly code: DataUriErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DataUriError";
  }
}

/**
 * Type guard for DataUriError, optionally narrowed to a single code
 */
export function isDataUriError(error: unknown, code?: DataUriErrorCode): error is DataUriError {
  return error instanceof DataUriError && (code === undefined || error.code === code);
}

/**
 * Render any thrown value as a one-line message for tool output and logs
 */
export function describeError(error: unknown): string {
  if (isDataUriError(error)) {
    return `${error.code}: ${error.message}`;
  }
  return error instanceof Error ? error.message : "Unknown error";
}
