/**
 * Error Message Utility
 * Maps thrown values onto job failure kinds and user-facing messages.
 */

import {
  type ErrorKind,
  FetchError,
  MergeError,
  OrganizeError,
  PipelineError,
  ResolverError,
  errnoCode,
} from "./errors.js";

export interface JobError {
  kind: ErrorKind;
  message: string;
}

/**
 * Classifies any error raised while running a job stage.
 */
export function classifyError(error: unknown): ErrorKind {
  if (error instanceof PipelineError) {
    return error.kind;
  }
  if (error instanceof ResolverError) {
    return error.reason === "NetworkError" ? "NetworkError" : "ResolutionFailed";
  }
  if (error instanceof FetchError) {
    return error.reason === "DiskFull" ? "DiskFull" : "NetworkError";
  }
  if (error instanceof MergeError) {
    return error.reason;
  }
  if (error instanceof OrganizeError) {
    return "IOError";
  }

  const code = errnoCode(error);
  if (code === "ENOSPC" || code === "EDQUOT") {
    return "DiskFull";
  }
  if (code && code.startsWith("E")) {
    return "IOError";
  }
  return "Internal";
}

/**
 * Builds the terminal error recorded on a job.
 * A job whose cancel signal fired is always reported as cancelled.
 */
export function toJobError(error: unknown, cancelled = false): JobError {
  if (cancelled) {
    return { kind: "Cancelled", message: "Cancelled by request" };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { kind: classifyError(error), message };
}
