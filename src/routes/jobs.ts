/**
 * Job Routes
 * Submit, inspect, cancel and stream download jobs.
 */

import { Router } from "express";
import type { Pipeline } from "../jobs/pipeline.js";
import { createJobsController } from "../controllers/jobsController.js";
import { createProgressController } from "../controllers/progressController.js";
import { validateBody } from "../middlewares/validation.js";
import { submitJobSchema } from "../middlewares/schemas/jobSchemas.js";
import { strictLimiter } from "../middlewares/rateLimiting.js";

export function createJobsRouter(pipeline: Pipeline): Router {
  const router = Router();
  const jobs = createJobsController(pipeline);

  router.post("/", strictLimiter, validateBody(submitJobSchema), jobs.submitJob);
  router.get("/", jobs.listJobs);
  router.get("/:id", jobs.getJob);
  router.delete("/:id", jobs.cancelJob);

  /** SSE stream of one job's status changes */
  router.get("/:id/stream", createProgressController(pipeline));

  return router;
}
