import type { Request, Response, NextFunction, RequestHandler } from "express";
import { z, type ZodTypeAny } from "zod";
import { logError } from "../logger";

/**
 * Error with an HTTP status, thrown by route handlers and rendered by
 * apiErrorHandler as `{ error: message }`.
 */
export class HttpError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = "HttpError";
  }
}

/**
 * Parse the request body against a Zod schema. Validation failures
 * surface as a 400 through apiErrorHandler.
 */
export function parseBody<T extends ZodTypeAny>(schema: T, req: Request): z.infer<T> {
  return schema.parse(req.body ?? {});
}

/**
 * Parse query parameters against a Zod schema
 */
export function parseQuery<T extends ZodTypeAny>(schema: T, req: Request): z.infer<T> {
  return schema.parse(req.query);
}

/**
 * Express 4 does not forward rejected promises; route them to next().
 */
export function asyncHandler(
  fn: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

function hasStatus(err: unknown): err is { status: number; type?: unknown } {
  return typeof err === "object" && err !== null && "status" in err && typeof err.status === "number";
}

/**
 * Standard error response format
 */
export interface ApiError {
  error: string;
  details?: Array<{ path: string; message: string }>;
}

/**
 * Standardized error handler
 */
export function apiErrorHandler(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  // Don't handle if response already sent
  if (res.headersSent) {
    return next(err);
  }

  if (err instanceof z.ZodError) {
    const body: ApiError = {
      error: "Validation failed",
      details: err.errors.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    };
    res.status(400).json(body);
    return;
  }

  if (err instanceof HttpError) {
    res.status(err.status).json({ error: err.message } satisfies ApiError);
    return;
  }

  // body-parser failures (malformed JSON, oversized payloads)
  if (hasStatus(err) && err.status >= 400 && err.status < 500) {
    res.status(err.status).json({ error: err.type === "entity.parse.failed" ? "Invalid JSON body" : "Invalid request body" } satisfies ApiError);
    return;
  }

  logError(`${req.method} ${req.path} failed`, "api", err);
  res.status(500).json({ error: "Internal server error" } satisfies ApiError);
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: "Not Found" } satisfies ApiError);
}
