import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import { ZodError } from "zod";
import { isEngagementError } from "../services/errors";
import defaultLogger, { type ServiceLogger } from "../logger";

/** Forwards a rejected handler promise to the error middleware. */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

export function errorHandler(logger: ServiceLogger = defaultLogger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof ZodError) {
      res.status(400).json({ message: "Invalid request", code: "INVALID_INPUT", details: { issues: err.issues } });
      return;
    }
    if (isEngagementError(err)) {
      res.status(err.status).json({ message: err.message, code: err.code, details: err.details ?? {} });
      return;
    }
    logger.error({ err, method: req.method, path: req.path }, "Unhandled request error");
    res.status(500).json({ message: "Internal Server Error" });
  };
}
