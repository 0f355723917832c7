/**
 * Jobs Controller
 * Thin HTTP layer over the download pipeline.
 */

import type { Request, Response, NextFunction } from "express";
import type { Pipeline } from "../jobs/pipeline.js";
import type { SubmitJobBody } from "../middlewares/schemas/jobSchemas.js";
import { NotFoundError } from "../utils/errors.js";

export function createJobsController(pipeline: Pipeline) {
  /**
   * POST /jobs
   * Queues a download. A URL rejected by the pre-check is still recorded as a failed job.
   */
  function submitJob(req: Request, res: Response, next: NextFunction): void {
    try {
      const body: SubmitJobBody = req.body;
      const handle = pipeline.submit(body.url);
      const status = handle.status();

      if (status.error?.kind === "InvalidInput") {
        res.status(400).json({ error: status.error.message, jobId: handle.id, status });
        return;
      }

      res.status(202).json({ jobId: handle.id, status });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /jobs
   */
  function listJobs(_req: Request, res: Response, next: NextFunction): void {
    try {
      res.json({ jobs: [...pipeline.jobs()], summary: pipeline.summary() });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /jobs/:id
   */
  function getJob(req: Request<{ id: string }>, res: Response, next: NextFunction): void {
    try {
      const status = pipeline.status(req.params.id);
      if (!status) {
        throw new NotFoundError("Job", req.params.id);
      }
      res.json(status);
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /jobs/:id
   */
  function cancelJob(req: Request<{ id: string }>, res: Response, next: NextFunction): void {
    try {
      const { id } = req.params;
      if (!pipeline.cancel(id)) {
        throw new NotFoundError("Active job", id);
      }
      res.status(202).json({ jobId: id, cancelled: true });
    } catch (error) {
      next(error);
    }
  }

  return { submitJob, listJobs, getJob, cancelJob };
}
