import express, { type Express } from "express";
import helmet from "helmet";
import cors from "cors";
import type { Pipeline } from "./jobs/pipeline.js";
import type { ToolStatus } from "./types/media.js";
import { createRouter } from "./routes/index.js";
import { apiLimiter } from "./middlewares/rateLimiting.js";
import { errorHandler } from "./middlewares/errorHandler.js";

/**
 * Builds the Express application over a running pipeline.
 */
export function createApp(pipeline: Pipeline, toolStatus: ToolStatus): Express {
  const app = express();

  /** Disable the X-Powered-By header to reduce fingerprinting. */
  app.disable("x-powered-by");

  /** Adds standard security headers. */
  app.use(helmet());
  /** Enables CORS for cross-origin requests. */
  app.use(cors());
  app.use(express.json({ limit: "100kb" }));

  /** Rate limiting for all routes. */
  app.use(apiLimiter);

  app.use(createRouter(pipeline, toolStatus));

  /** Global error handler - MUST be last. */
  app.use(errorHandler);

  return app;
}
