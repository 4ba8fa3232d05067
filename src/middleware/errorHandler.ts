// src/middleware/errorHandler.ts
// Centralized error handling middleware - prevents stack trace leaks in production

import { Request, Response, NextFunction, RequestHandler } from "express";
import mongoose from "mongoose";
import { ProtocolError } from "../protocol/errors";

/**
 * Custom error class for application errors
 * Allows structured error handling with status codes
 */
export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(message: string, statusCode: number = 500) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Handle MongoDB validation errors
 * Converts Mongoose validation errors to user-friendly messages
 */
const handleValidationError = (err: mongoose.Error.ValidationError): AppError => {
  const errors = Object.values(err.errors).map((e) => e.message);
  return new AppError(`Validation Error: ${errors.join(", ")}`, 400);
};

/**
 * Handle MongoDB cast errors (invalid number, date, etc.)
 */
const handleCastError = (err: mongoose.Error.CastError): AppError => {
  return new AppError(`Invalid ${err.path}: ${err.value}`, 400);
};

// Store failures bubble up from the record store as ProtocolError("STORE")
const handleProtocolError = (err: ProtocolError): AppError => {
  if (err.code === "STORE") return new AppError("Record store unavailable", 503);
  return new AppError(err.message, 400);
};

// body-parser and other http-errors carry their own status
const httpStatusOf = (err: Error): number | null => {
  const status: unknown = Reflect.get(err, "status");
  return typeof status === "number" ? status : null;
};

const normalizeError = (err: Error): AppError => {
  if (err instanceof AppError) return err;
  if (err instanceof mongoose.Error.ValidationError) return handleValidationError(err);
  if (err instanceof mongoose.Error.CastError) return handleCastError(err);
  if (err instanceof ProtocolError) return handleProtocolError(err);

  const status = httpStatusOf(err);
  if (status !== null && status < 500) return new AppError(err.message, status);

  const unexpected = new AppError(err.message || "Internal server error", 500);
  unexpected.isOperational = false;
  return unexpected;
};

interface ErrorResponse {
  success: false;
  message: string;
  error?: string;
  stack?: string;
}

/**
 * Main error handling middleware
 * NEVER leaks stack traces or sensitive info in production
 */
export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction): void => {
  const isDevelopment = process.env.NODE_ENV === "development";

  console.error("Error:", {
    message: err.message,
    stack: isDevelopment ? err.stack : undefined,
    path: req.path,
    method: req.method,
  });

  const error = normalizeError(err);
  const statusCode = error.statusCode || 500;

  const response: ErrorResponse = {
    success: false,
    message: error.isOperational || isDevelopment ? error.message : "Internal server error",
  };

  // Only include error details in development
  if (isDevelopment) {
    response.error = err.message;
    if (err.stack) response.stack = err.stack;
  }

  res.status(statusCode).json(response);
};

/**
 * Async error wrapper
 * Catches async errors and passes them to error handler
 * Usage: wrapAsync(async (req, res) => { ... })
 */
export const wrapAsync = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler => {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

/**
 * 404 Not Found handler
 * Must be after all routes
 */
export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    success: false,
    message: `Route ${req.originalUrl} not found`,
  });
};
