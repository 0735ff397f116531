/**
 * Error Handler Middleware
 *
 * Turns errors thrown in route handlers into `{ detail }` JSON responses.
 * Must be registered last in the middleware chain.
 */

import { Request, Response, NextFunction } from "express";
import multer from "multer";
import { AppError, PayloadTooLargeError, ValidationError } from "../errors.js";

/**
 * Map framework errors onto the domain error types
 */
function normalizeError(err: unknown): unknown {
  if (err instanceof multer.MulterError) {
    return err.code === "LIMIT_FILE_SIZE"
      ? new PayloadTooLargeError("File too large")
      : new ValidationError(`Invalid upload: ${err.message}`);
  }
  return err;
}

/**
 * Global error handler middleware.
 *
 * Note: Must have 4 parameters for Express to recognize it as an error handler.
 */
export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const error = normalizeError(err);

  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      console.error(`[Error Handler] ${error.code}:`, error.message, error.cause ?? "");
    }
    res.status(error.statusCode).json({ detail: error.message });
    return;
  }

  // Body parser errors carry a client status of their own
  if (isHttpError(error) && error.status < 500) {
    res.status(error.status).json({ detail: error.message });
    return;
  }

  console.error("Unhandled error:", error);
  res.status(500).json({ detail: "Internal server error" });
}

function isHttpError(error: unknown): error is Error & { status: number } {
  return error instanceof Error && "status" in error && typeof error.status === "number";
}

/**
 * Async route wrapper to catch errors in async handlers.
 * Wraps an async function and forwards any errors to the error handler.
 *
 * Usage:
 *   router.get('/path', asyncHandler(async (req, res) => { ... }))
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Fallback for unmatched routes
 */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ detail: "Not found" });
}
