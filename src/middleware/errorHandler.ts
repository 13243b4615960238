// Centralized error handling
import type { Request, Response, NextFunction, RequestHandler } from "express";

export class AppError extends Error {
  statusCode: number;
  code: string | null;
  details: unknown;

  constructor(
    message: string,
    statusCode: number = 500,
    options?: { code?: string; details?: unknown }
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = options?.code ?? null;
    this.details = options?.details ?? null;
    Error.captureStackTrace(this, this.constructor);
  }
}

export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => unknown): RequestHandler =>
  (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };

// body-parser marks unparseable JSON bodies with this type
function isBodyParseError(err: Error): boolean {
  return "type" in err && err.type === "entity.parse.failed";
}

export const errorHandler = (err: Error, _req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    return next(err);
  }

  if (err instanceof AppError) {
    if (err.statusCode >= 500) console.error("Error:", err.message);
    const payload: Record<string, unknown> = {
      success: false,
      error: err.message,
    };
    if (err.code) payload.code = err.code;
    if (err.details) payload.details = err.details;
    return res.status(err.statusCode).json(payload);
  }

  if (isBodyParseError(err)) {
    return res.status(400).json({ success: false, error: "Invalid JSON body" });
  }

  console.error("Error:", err);
  res.status(500).json({ success: false, error: "Internal server error" });
};
