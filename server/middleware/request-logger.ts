import type { RequestHandler } from "express";
import defaultLogger, { type ServiceLogger } from "../logger";

export function requestLogger(logger: ServiceLogger = defaultLogger): RequestHandler {
  return (req, res, next) => {
    const start = Date.now();
    const requestPath = req.path;
    res.on("finish", () => {
      if (!requestPath.startsWith("/api")) return;
      const fields = {
        method: req.method,
        path: requestPath,
        status: res.statusCode,
        durationMs: Date.now() - start,
      };
      if (res.statusCode >= 500) {
        logger.error(fields, "API request failed");
      } else {
        logger.info(fields, "API request");
      }
    });
    next();
  };
}
