/**
 * Route Aggregator
 * Combines all routers into a single router.
 */

import { Router } from "express";
import type { Pipeline } from "../jobs/pipeline.js";
import type { ToolStatus } from "../types/media.js";
import { createHealthRouter } from "./health.js";
import { createJobsRouter } from "./jobs.js";

export function createRouter(pipeline: Pipeline, toolStatus: ToolStatus): Router {
  const router = Router();

  router.use(createHealthRouter(toolStatus));
  router.use("/jobs", createJobsRouter(pipeline));

  return router;
}
