#!/usr/bin/env tsx

import 'dotenv/config';
import { Command } from "commander";
import { format } from "date-fns";
import { z } from "zod";
import { loadConfig } from "../server/config";
import { createDatabase, waitForDb } from "../server/db";
import logger from "../server/logger";
import { createEngagementServices } from "../server/services/engagement";
import { createPostgresStore } from "../server/services/postgres-store";
import { buildPostIncidentProgram, schedulePostIncidentProgram } from "../server/services/program";

const program = new Command();

const optionsSchema = z.object({
  start: z.coerce.date().optional(),
  dryRun: z.boolean().default(false),
});

type SeedOptions = z.infer<typeof optionsSchema>;

async function run(options: SeedOptions) {
  const now = new Date();
  const start = options.start ?? now;

  if (options.dryRun) {
    for (const planned of buildPostIncidentProgram(start)) {
      console.info(
        "%s  %s  %d min  capacity %d",
        format(planned.scheduledAt, "yyyy-MM-dd HH:mm"),
        planned.type.padEnd(10),
        planned.durationMinutes,
        planned.capacity,
      );
    }
    return;
  }

  const { databaseUrl } = loadConfig();
  if (!databaseUrl) {
    throw new Error("DATABASE_URL environment variable is required unless --dry-run is set");
  }
  const database = createDatabase(databaseUrl);
  try {
    await waitForDb(database.pool);
    const store = await createPostgresStore(database.db);
    const { catalog } = createEngagementServices({ store, logger });
    const sessions = await schedulePostIncidentProgram(catalog, start, now);
    console.info("Scheduled %d sessions starting %s", sessions.length, format(start, "yyyy-MM-dd"));
  } finally {
    await database.pool.end();
  }
}

program
  .name("seed-program")
  .description("Schedule the post-incident office hours program")
  .option("--start <date>", "First day of the program (defaults to today)")
  .option("--dry-run", "Print the plan without writing it")
  .action(async (opts: { start?: string; dryRun?: boolean }) => {
    const parsed = optionsSchema.safeParse({ start: opts.start, dryRun: Boolean(opts.dryRun) });
    if (!parsed.success) {
      console.error("Invalid options", parsed.error.issues.map((issue) => issue.message).join(", "));
      process.exitCode = 1;
      return;
    }

    await run(parsed.data);
  });

program.parseAsync().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
