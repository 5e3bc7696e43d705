import pino, { type Logger } from "pino";
import type { AppConfig } from "./config";

export type ServiceLogger = Pick<Logger, "info" | "warn" | "error">;

const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  base: { service: "engagement-scheduler" },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/** Applies the validated level and tags every line with the environment. */
export function configureLogger(config: Pick<AppConfig, "logLevel" | "env">, target: Logger = logger): Logger {
  target.level = config.logLevel;
  return target.child({ env: config.env });
}

export default logger;
