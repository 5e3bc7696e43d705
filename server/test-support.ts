import express, { type Express } from "express";
import {
  customerIdSchema,
  type Customer,
  type CustomerSegment,
  type IncidentImpact,
} from "@shared/schema";
import type { ScheduleSessionInput } from "@shared/schemas";
import type { ServiceLogger } from "./logger";
import { registerRoutes } from "./routes";
import { FixedClock } from "./services/clock";
import { createEngagementServices, type EngagementServices } from "./services/engagement";
import { EventBus } from "./services/event-bus";
import type { InviteDispatcher, InviteNotice } from "./services/invite-dispatcher";
import { createInMemoryStore } from "./services/memory-store";
import type { EngagementStore } from "./services/repositories";

export const TEST_NOW = new Date("2026-03-02T09:00:00.000Z");
export const DAY_MS = 24 * 60 * 60 * 1000;

export const silentLogger: ServiceLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function createRecordingLogger() {
  const lines: Array<{ level: "info" | "warn" | "error"; msg: string }> = [];
  const logger: ServiceLogger = {
    info: (_obj: unknown, msg?: string) => {
      lines.push({ level: "info", msg: String(msg) });
    },
    warn: (_obj: unknown, msg?: string) => {
      lines.push({ level: "warn", msg: String(msg) });
    },
    error: (_obj: unknown, msg?: string) => {
      lines.push({ level: "error", msg: String(msg) });
    },
  };
  return { logger, lines };
}

export class RecordingDispatcher implements InviteDispatcher {
  readonly notices: InviteNotice[] = [];

  dispatch(notice: InviteNotice): void {
    this.notices.push(notice);
  }
}

export interface TestHarness extends EngagementServices {
  clock: FixedClock;
  dispatcher: RecordingDispatcher;
  events: EventBus;
}

export function createTestHarness(now: Date = TEST_NOW): TestHarness {
  const clock = new FixedClock(now);
  const store = createInMemoryStore(clock);
  const dispatcher = new RecordingDispatcher();
  const events = new EventBus({ driver: "memory", logger: silentLogger, clock });
  const services = createEngagementServices({ store, clock, dispatcher, events, logger: silentLogger });
  return { ...services, clock, dispatcher, events };
}

export function createTestApp(now: Date = TEST_NOW): { app: Express; harness: TestHarness } {
  const harness = createTestHarness(now);
  const app = express();
  app.use(express.json());
  registerRoutes(app, harness, { logger: silentLogger });
  return { app, harness };
}

export interface CustomerFixture {
  id: string;
  name?: string;
  segment?: CustomerSegment;
  contractValue?: number;
  incidentImpact?: IncidentImpact;
  lastEngagementAt?: Date | null;
  trustScore?: number;
  phone?: string | null;
}

export function addCustomer(store: EngagementStore, fixture: CustomerFixture): Promise<Customer> {
  return store.customers.upsert({
    id: customerIdSchema.parse(fixture.id),
    name: fixture.name ?? `Customer ${fixture.id}`,
    segment: fixture.segment ?? "enterprise",
    contractValue: fixture.contractValue ?? 250_000,
    incidentImpact: fixture.incidentImpact ?? "medium",
    primaryContact: {
      name: "Pat Contact",
      email: `${fixture.id}@example.com`,
      phone: fixture.phone ?? null,
      role: "Head of Platform",
      timezone: "UTC",
    },
    successManager: "csm@example.com",
    lastEngagementAt: fixture.lastEngagementAt ?? null,
    trustScore: fixture.trustScore,
  });
}

export function sessionInput(overrides: Partial<ScheduleSessionInput> = {}): ScheduleSessionInput {
  return {
    type: "regular",
    scheduledAt: new Date(TEST_NOW.getTime() + DAY_MS),
    durationMinutes: 60,
    capacity: 50,
    ...overrides,
  };
}
