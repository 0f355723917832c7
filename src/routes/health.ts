/**
 * Health Check Routes
 * Infrastructure endpoints for monitoring and orchestration.
 */

import { Router } from "express";
import type { ToolStatus } from "../types/media.js";

export function createHealthRouter(toolStatus: ToolStatus): Router {
  const router = Router();

  /** Simple health check endpoint. */
  router.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  /** Readiness check; separate-stream jobs fail with ToolMissing while ffmpeg is absent. */
  router.get("/ready", (_req, res) => {
    res.json({ ready: true, ffmpeg: toolStatus });
  });

  return router;
}
