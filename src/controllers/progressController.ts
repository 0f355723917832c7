/**
 * Progress Controller
 * Handles SSE streaming for job status updates
 */

import type { Request, Response } from "express";
import type { Pipeline } from "../jobs/pipeline.js";
import { formatSseMessage, streamJobProgress } from "../services/business/progressStreamService.js";

/**
 * SSE endpoint for job status streaming
 * GET /jobs/:id/stream
 */
export function createProgressController(pipeline: Pipeline) {
  return async function streamProgress(req: Request, res: Response): Promise<void> {
    const jobId = req.params.id;

    console.log(`[sse] Client connected for job ${jobId}`);

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no"); // Disable nginx buffering
    res.flushHeaders();

    const disconnect = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) {
        console.log(`[sse] Client disconnected from job ${jobId}`);
      }
      disconnect.abort();
    });

    try {
      await streamJobProgress(pipeline, jobId, res, disconnect.signal);
    } catch (error) {
      console.error(`[sse] Error streaming job ${jobId}:`, error);
      if (!res.writableEnded) {
        res.write(formatSseMessage({ type: "error", message: "Stream error" }));
        res.end();
      }
    }
  };
}
