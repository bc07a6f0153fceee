/**
 * Global Error Handler Middleware
 *
 * Catches all errors and returns consistent error responses.
 */

import { Request, Response, NextFunction } from "express";
import multer from "multer";
import { ZodError } from "zod";
import { config } from "../config";
import { ApiError } from "../utils/errors";
import { logger as rootLogger } from "../utils/logger";

export { ApiError } from "../utils/errors";

const logger = rootLogger.child({ service: "http" });

// Error response interface
interface ErrorResponse {
  success: false;
  message: string;
  error?: string;
  stack?: string;
}

function resolveStatus(err: Error): { statusCode: number; message: string } {
  if (err instanceof ApiError) {
    return { statusCode: err.statusCode, message: err.message };
  }

  // Request bodies are validated with zod
  if (err instanceof ZodError) {
    const detail = err.issues.map(issue => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
    return { statusCode: 422, message: detail };
  }

  if (err instanceof multer.MulterError) {
    return err.code === "LIMIT_FILE_SIZE"
      ? { statusCode: 413, message: "Image too large" }
      : { statusCode: 400, message: err.message };
  }

  // Mongoose validation errors
  if (err.name === "ValidationError") {
    return { statusCode: 400, message: err.message };
  }

  // Mongoose cast errors
  if (err.name === "CastError") {
    return { statusCode: 400, message: "Invalid ID format" };
  }

  // Duplicate key errors
  if ("code" in err && err.code === 11000) {
    return { statusCode: 409, message: "Duplicate entry" };
  }

  return { statusCode: 500, message: "Internal server error" };
}

/**
 * Global error handler middleware
 */
export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction): void => {
  const { statusCode, message } = resolveStatus(err);

  if (statusCode >= 500) {
    logger.error({ method: req.method, path: req.path, err }, "Request failed");
  } else {
    logger.warn({ method: req.method, path: req.path, statusCode, message }, "Request rejected");
  }

  const response: ErrorResponse = {
    success: false,
    message,
  };

  // Include stack trace in development
  if (config.isDevelopment) {
    response.error = err.message;
    response.stack = err.stack;
  }

  res.status(statusCode).json(response);
};

/**
 * 404 Not Found handler
 */
export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    success: false,
    message: `Route not found: ${req.method} ${req.path}`,
  });
};
