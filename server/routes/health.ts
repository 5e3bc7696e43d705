import type { Express } from "express";
import type pg from "pg";
import type { Clock } from "../services/clock";
import { systemClock } from "../services/clock";
import defaultLogger, { type ServiceLogger } from "../logger";

interface HealthRouteOptions {
  clock?: Clock;
  pool?: pg.Pool | null;
  logger?: ServiceLogger;
}

export function registerHealthRoutes(app: Express, options: HealthRouteOptions = {}) {
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? defaultLogger;

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", time: clock.now().toISOString(), storage: options.pool ? "postgres" : "memory" });
  });

  const pool = options.pool;
  if (!pool) return;
  app.get("/health/db", async (_req, res) => {
    try {
      await pool.query("select 1");
      res.json({ status: "ok" });
    } catch (err) {
      logger.error({ err }, "Database health check failed");
      res.status(500).json({ status: "error" });
    }
  });
}
