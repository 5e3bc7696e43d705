import type { Express } from "express";
import { createServer, type Server } from "http";
import type pg from "pg";
import { errorHandler } from "./middleware/errors";
import { registerCustomerRoutes } from "./routes/customers";
import { registerHealthRoutes } from "./routes/health";
import { registerOutreachRoutes } from "./routes/outreach";
import { registerReportRoutes } from "./routes/reports";
import { registerSessionRoutes } from "./routes/sessions";
import type { EngagementServices } from "./services/engagement";
import defaultLogger, { type ServiceLogger } from "./logger";

interface RegisterRoutesOptions {
  pool?: pg.Pool | null;
  logger?: ServiceLogger;
}

export function registerRoutes(
  app: Express,
  services: EngagementServices,
  options: RegisterRoutesOptions = {},
): Server {
  const logger = options.logger ?? defaultLogger;

  registerHealthRoutes(app, { clock: services.clock, pool: options.pool, logger });
  registerCustomerRoutes(app, services, logger);
  registerSessionRoutes(app, services);
  registerOutreachRoutes(app, services.outreach);
  registerReportRoutes(app, services.reporting);

  app.use("/api", (_req, res) => {
    res.status(404).json({ message: "Not found", code: "NOT_FOUND" });
  });
  app.use(errorHandler(logger));

  return createServer(app);
}
