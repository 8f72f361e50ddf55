// src/middleware/errorHandler.ts
import { Request, Response, NextFunction } from "express";
import multer from "multer";

export interface ApiError extends Error {
  statusCode?: number;
  details?: Record<string, unknown>;
}

export function createApiError(
  statusCode: number,
  message: string,
  details?: Record<string, unknown>
): ApiError {
  const err: ApiError = new Error(message);
  err.statusCode = statusCode;
  if (details) err.details = details;
  return err;
}

export const badRequest = (message: string, details?: Record<string, unknown>) =>
  createApiError(400, message, details);

export function payloadTooLarge(maxBytes: number): ApiError {
  const mb = maxBytes / (1024 * 1024);
  const limit = Number.isInteger(mb) ? `${mb}MB` : `${maxBytes} bytes`;
  return createApiError(413, `File size exceeds maximum limit (${limit})`);
}

export function errorHandler(
  err: ApiError,
  req: Request,
  res: Response,
  // Express only treats four-argument middleware as an error handler
  next: NextFunction
) {
  const status = err instanceof multer.MulterError ? 400 : err.statusCode || 500;
  if (status >= 500) {
    console.error(`[ERROR] ${req.method} ${req.url}`, err);
  } else {
    console.warn(`[WARN] ${req.method} ${req.url} → ${status} ${err.message}`);
  }

  res.status(status).json({
    success: false,
    message: status >= 500 ? "Internal Server Error" : err.message,
    ...(err.details && { details: err.details }),
  });
}
