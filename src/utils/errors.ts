/**
 * Custom Application Errors
 * Domain-specific error classes for better error handling.
 */

/**
 * Base application error class.
 * All domain errors should extend this.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Resource not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} with id '${identifier}' not found`
      : `${resource} not found`;
    super(message, 404);
  }
}

/** Terminal failure kinds recorded on a job. */
export type ErrorKind =
  | "InvalidInput"
  | "ResolutionFailed"
  | "NetworkError"
  | "DiskFull"
  | "IOError"
  | "ToolMissing"
  | "EncodeError"
  | "Cancelled"
  | "Internal";

export type ResolveFailure = "InvalidURL" | "Unavailable" | "NetworkError";
export type FetchFailure = "NetworkError" | "Interrupted" | "DiskFull";
export type MergeFailure = "ToolMissing" | "EncodeError";
export type OrganizeFailure = "PathConflict" | "IOError";

/**
 * Stream lookup failed (yt-dlp or another resolver).
 */
export class ResolverError extends AppError {
  constructor(public readonly reason: ResolveFailure, message: string) {
    super(message, reason === "NetworkError" ? 502 : 422);
  }
}

/**
 * Downloading one stream to its temp file failed.
 * The partial file has already been removed when this is thrown.
 */
export class FetchError extends AppError {
  constructor(public readonly reason: FetchFailure, message: string) {
    super(message, reason === "DiskFull" ? 507 : 502);
  }
}

/**
 * Multiplexing the video and audio files failed, or the tool is absent.
 */
export class MergeError extends AppError {
  constructor(public readonly reason: MergeFailure, message: string) {
    super(message, reason === "ToolMissing" ? 503 : 500);
  }
}

/**
 * Moving the finished file into the output tree failed.
 */
export class OrganizeError extends AppError {
  constructor(public readonly reason: OrganizeFailure, message: string) {
    super(message, reason === "PathConflict" ? 409 : 500);
  }
}

/**
 * Job-level failure raised by the pipeline itself (pre-checks, selection, cancellation).
 */
export class PipelineError extends AppError {
  constructor(public readonly kind: ErrorKind, message: string) {
    super(message, kind === "InvalidInput" ? 400 : 500);
  }
}

/**
 * Reads the errno-style `code` of a Node.js system error, if any.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
