/**
 * Progress Stream Service
 *
 * Server-Sent Events for live job status. The pipeline's `watch` async
 * generator yields the current status and then every change; each one is
 * written to the response as `data: {JSON}\n\n`.
 *
 * Message types:
 * - connected: sent as soon as the client connects
 * - status: the job's full status, once per change
 * - complete: the job reached done or failed; the response is closed after it
 * - error: unknown job id; the response is closed after it
 */

import type { Response } from "express";
import type { Pipeline } from "../../jobs/pipeline.js";
import { isTerminal, type JobState, type JobStatus } from "../../repositories/jobRepository.js";

export type StreamMessage =
  | { type: "connected"; jobId: string }
  | { type: "status"; job: JobStatus }
  | { type: "complete"; jobId: string; state: JobState }
  | { type: "error"; message: string };

export function formatSseMessage(message: StreamMessage): string {
  return `data: ${JSON.stringify(message)}\n\n`;
}

/**
 * Streams a job's status changes until it settles or the client goes away.
 * The signal fires when the client disconnects.
 */
export async function streamJobProgress(
  pipeline: Pipeline,
  jobId: string,
  res: Response,
  signal: AbortSignal
): Promise<void> {
  res.write(formatSseMessage({ type: "connected", jobId }));

  if (!pipeline.status(jobId)) {
    res.write(formatSseMessage({ type: "error", message: "Job not found" }));
    res.end();
    return;
  }

  for await (const status of pipeline.watch(jobId, signal)) {
    res.write(formatSseMessage({ type: "status", job: status }));

    if (isTerminal(status.state)) {
      res.write(formatSseMessage({ type: "complete", jobId, state: status.state }));
      res.end();
      console.log(`[sse] Job ${jobId} ${status.state}, closing connection`);
      return;
    }
  }

  if (!res.writableEnded) {
    res.end();
  }
}
