/**
 * Error Handler Middleware
 * Centralized error handling for Express application.
 */

import type { Request, Response, NextFunction } from "express";
import { AppError } from "../utils/errors.js";
import { NODE_ENV } from "../config/env.js";

/**
 * Global error handler middleware.
 * Catches all errors and returns appropriate responses.
 * MUST be registered last in middleware chain.
 */
export function errorHandler(
  error: Error | AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  // Default to 500 if not an AppError (body-parser errors carry their own 4xx status)
  const statusCode = error instanceof AppError ? error.statusCode : clientErrorStatus(error) ?? 500;
  const message = error.message || "Internal server error";

  console.error(`[Error] ${statusCode} - ${message}`, {
    error: error.name,
    stack: error.stack,
    path: req.path,
    method: req.method,
  });

  // Send response
  const response: { error: string; stack?: string } = {
    error: message,
  };

  // Include stack trace in development
  if (NODE_ENV !== "production") {
    response.stack = error.stack;
  }

  res.status(statusCode).json(response);
}

function clientErrorStatus(error: Error): number | null {
  if ("status" in error && typeof error.status === "number" && error.status >= 400 && error.status < 500) {
    return error.status;
  }
  return null;
}
