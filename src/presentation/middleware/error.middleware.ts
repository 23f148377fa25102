import { NextFunction, Request, Response } from "express";
import {
  ArtifactNotFoundError,
  JobNotFoundError,
  JobStateConflictError,
  ValidationError,
} from "../../domain/errors/job.errors";
import { errorMessage, FetchError } from "../../domain/errors/pipeline.errors";

export function statusCodeFor(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof JobNotFoundError || error instanceof ArtifactNotFoundError) return 404;
  if (error instanceof JobStateConflictError) return 409;
  if (error instanceof FetchError) return 502;
  return 500;
}

export function sendError(res: Response, error: unknown, fallbackMessage: string): void {
  const status = statusCodeFor(error);
  if (status >= 500) {
    console.error(`[HTTP] ${fallbackMessage}:`, error);
  }
  res.status(status).json({ error: errorMessage(error) || fallbackMessage });
}

/** Last handler in the chain: malformed JSON bodies and anything a route did not catch. */
export function errorHandler(error: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }
  if (error instanceof SyntaxError) {
    res.status(400).json({ error: "Request body is not valid JSON" });
    return;
  }
  sendError(res, error, "Internal server error");
}
