// src/middleware/errorHandler.ts
import type { NextFunction, Request, Response } from "express";
import mongoose from "mongoose";
import { AppError, isDuplicateKeyError } from "../lib/errors";

export interface ApiError {
  statusCode: number;
  message: string;
  details?: unknown;
}

const isBodyParserError = (err: unknown): err is { status: number; type: string } =>
  typeof err === "object" && err !== null && "type" in err && "status" in err && typeof err.status === "number";

export const toApiError = (err: unknown): ApiError => {
  if (err instanceof AppError) {
    return { statusCode: err.statusCode, message: err.message, details: err.details };
  }
  if (err instanceof mongoose.Error.ValidationError) {
    const details = Object.fromEntries(
      Object.entries(err.errors).map(([field, e]) => [field, e.message])
    );
    return { statusCode: 400, message: "Validation failed", details };
  }
  if (err instanceof mongoose.Error.CastError) {
    return { statusCode: 400, message: `Invalid value for ${err.path}` };
  }
  if (isDuplicateKeyError(err)) {
    return { statusCode: 409, message: "Duplicate record" };
  }
  if (isBodyParserError(err)) {
    return { statusCode: err.status, message: err.type === "entity.parse.failed" ? "Malformed JSON body" : "Bad request" };
  }
  return { statusCode: 500, message: "Internal Server Error" };
};

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const apiError = toApiError(err);
  if (apiError.statusCode >= 500) {
    console.error(`[ERROR] ${req.method} ${req.originalUrl}`, err);
  }

  res.status(apiError.statusCode).json({
    success: false,
    message: apiError.message,
    ...(apiError.details !== undefined && { details: apiError.details }),
  });
}
