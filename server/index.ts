import 'dotenv/config';
import express from "express";
import { loadConfig } from "./config";
import { createDatabase, waitForDb, type DatabaseHandle } from "./db";
import logger, { configureLogger } from "./logger";
import { requestLogger } from "./middleware/request-logger";
import { registerRoutes } from "./routes";
import { createEngagementServices } from "./services/engagement";
import { createEventBus } from "./services/event-bus";
import { QueuedInviteDispatcher } from "./services/invite-dispatcher";
import { createInMemoryStore } from "./services/memory-store";
import { NotificationService } from "./services/notification";
import { createPostgresStore } from "./services/postgres-store";
import type { EngagementStore } from "./services/repositories";

async function openStore(databaseUrl: string | null): Promise<{ store: EngagementStore; database: DatabaseHandle | null }> {
  if (!databaseUrl) {
    logger.warn("DATABASE_URL is not set; using in-memory storage");
    return { store: createInMemoryStore(), database: null };
  }
  const database = createDatabase(databaseUrl);
  await waitForDb(database.pool);
  return { store: await createPostgresStore(database.db), database };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const log = configureLogger(config);
  const { store, database } = await openStore(config.databaseUrl);

  const eventBus = createEventBus(config.eventBus, log);
  const dispatcher = new QueuedInviteDispatcher({
    notifications: new NotificationService({ settings: config.notifications, logger: log }),
    maxRetries: config.invites.maxRetries,
    retryDelayMs: config.invites.retryDelayMs,
    logger: log,
  });
  const services = createEngagementServices({ store, dispatcher, events: eventBus, logger: log });

  const app = express();
  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger(log));
  const server = registerRoutes(app, services, { pool: database?.pool ?? null, logger: log });

  const gracefulShutdown = async () => {
    try {
      server.close();
      await dispatcher.idle();
      await eventBus.shutdown();
      await database?.pool.end();
    } catch (err) {
      log.error({ err }, "Error during shutdown");
    } finally {
      process.exit(0);
    }
  };

  process.on("SIGTERM", () => void gracefulShutdown());
  process.on("SIGINT", () => void gracefulShutdown());

  server.listen(config.port, config.host, () => {
    log.info({ host: config.host, port: config.port, driver: eventBus.driver }, "Engagement scheduler listening");
  });
}

main().catch((err: unknown) => {
  logger.error({ err }, "Failed to start engagement scheduler");
  process.exit(1);
});
