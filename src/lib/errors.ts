export type ConversionErrorCode =
  | "UNSUPPORTED_FORMAT"
  | "FILE_TOO_LARGE"
  | "SESSION_QUOTA_EXCEEDED"
  | "NOT_FOUND"
  | "INVALID_STATE_TRANSITION"
  | "EXTRACTION_ERROR"
  | "NOTHING_TO_ARCHIVE";

/**
 * Base class for every error the pipeline raises on purpose. Anything else
 * reaching a caller is a bug.
 */
export class ConversionError extends Error {
  constructor(
    readonly code: ConversionErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnsupportedFormatError extends ConversionError {
  constructor(message: string) {
    super("UNSUPPORTED_FORMAT", message);
  }
}

export class FileTooLargeError extends ConversionError {
  constructor(
    readonly size: number,
    readonly limit: number,
  ) {
    super(
      "FILE_TOO_LARGE",
      `File is ${formatMb(size)}, above the ${formatMb(limit)} per-file limit`,
    );
  }
}

export class SessionQuotaExceededError extends ConversionError {
  constructor(
    readonly requested: number,
    readonly limit: number,
  ) {
    super(
      "SESSION_QUOTA_EXCEEDED",
      `Total upload size would exceed the ${formatMb(limit)} session limit. Remove some files first.`,
    );
  }
}

export class NotFoundError extends ConversionError {
  constructor(
    readonly resource: "session" | "file",
    readonly id: string,
  ) {
    super("NOT_FOUND", `${resource === "session" ? "Session" : "File"} not found: ${id}`);
  }
}

export class InvalidStateTransitionError extends ConversionError {
  constructor(message: string) {
    super("INVALID_STATE_TRANSITION", message);
  }
}

export class ExtractionError extends ConversionError {
  constructor(filename: string, cause: unknown) {
    super(
      "EXTRACTION_ERROR",
      `Could not read ${filename}: ${describeCause(cause)}`,
      { cause },
    );
  }
}

export class NothingToArchiveError extends ConversionError {
  constructor() {
    super("NOTHING_TO_ARCHIVE", "No converted files to download");
  }
}

export function isConversionError(err: unknown): err is ConversionError {
  return err instanceof ConversionError;
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === "string") return cause;
  return "unknown error";
}

function formatMb(bytes: number): string {
  const mb = bytes / (1024 * 1024);
  return `${Number.isInteger(mb) ? mb : mb.toFixed(1)}MB`;
}
