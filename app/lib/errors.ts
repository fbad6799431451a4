export type ErrorStatus = 400 | 404 | 413 | 415 | 422 | 500 | 502;

export type ErrorCode =
  | "malformed_input"
  | "unsupported_format"
  | "file_too_large"
  | "not_found"
  | "render_failed"
  | "invalid_request";

/**
 * Base class for errors that map onto a user-visible page and status code.
 * Every error is scoped to the request that raised it.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly status: ErrorStatus;
  readonly title: string;

  constructor(
    message: string,
    code: ErrorCode,
    status: ErrorStatus,
    title: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.title = title;
  }
}

/** The payload is not a readable EPUB container. */
export class MalformedInputError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "malformed_input", 422, "Unreadable EPUB", options);
  }
}

export class UnsupportedFormatError extends AppError {
  constructor(message = "Please upload an EPUB file.") {
    super(message, "unsupported_format", 415, "Unsupported file");
  }
}

export class FileTooLargeError extends AppError {
  readonly limitBytes: number;

  constructor(limitBytes: number) {
    super(
      `File size must be less than ${Math.round(limitBytes / (1024 * 1024))}MB.`,
      "file_too_large",
      413,
      "File too large",
    );
    this.limitBytes = limitBytes;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, "not_found", 404, "Not found");
  }
}

export class RenderFailedError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "render_failed", 502, "Export failed", options);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, "invalid_request", 400, "Invalid request");
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
