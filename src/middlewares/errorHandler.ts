/**
 * Error Handler Middleware
 * Centralized error handling for Express application.
 */

import type { Request, Response, NextFunction } from "express";
import { AppError, NotFoundError } from "../utils/errors.js";
import { NODE_ENV } from "../config/env.js";

interface ErrorResponse {
  error: string;
  stack?: string;
}

/**
 * Forwards requests no route matched to the error handler as 404s.
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.path}`));
}

/**
 * Global error handler middleware.
 * Catches all errors and returns appropriate responses.
 * MUST be registered last in middleware chain.
 */
export function errorHandler(
  error: Error | AppError,
  req: Request,
  res: Response,
  // Express recognises error handlers by their four parameters
  _next: NextFunction
): void {
  // Default to 500 if not an AppError
  const statusCode = error instanceof AppError ? error.statusCode : 500;
  const message = error.message || "Internal server error";

  const log = statusCode >= 500 ? console.error : console.warn;
  log(`[Error] ${statusCode} - ${message}`, {
    error: error.name,
    stack: statusCode >= 500 ? error.stack : undefined,
    path: req.path,
    method: req.method,
  });

  const response: ErrorResponse = {
    error: message,
  };

  // Include stack trace in development
  if (NODE_ENV !== "production") {
    response.stack = error.stack;
  }

  res.status(statusCode).json(response);
}
