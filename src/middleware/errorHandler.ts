// src/middleware/errorHandler.ts
import { Request, Response, NextFunction } from "express";

export interface ApiError extends Error {
  statusCode?: number;
  details?: unknown;
}

export function errorHandler(
  err: ApiError,
  req: Request,
  res: Response,
  // express only treats four-argument middleware as an error handler
  _next: NextFunction
) {
  const status = err.statusCode || 500;
  if (status >= 500) {
    console.error(`[ERROR] ${req.method} ${req.url}`, err);
  } else {
    console.warn(`[${status}] ${req.method} ${req.url}: ${err.message}`);
  }

  res.status(status).json({
    success: false,
    message: err.message || "Internal Server Error",
    ...(err.details !== undefined && { details: err.details }),
  });
}
