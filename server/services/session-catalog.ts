import { randomUUID } from "node:crypto";
import { sessionIdSchema, type Session, type SessionId, type SessionType } from "@shared/schema";
import { scheduleSessionSchema, type ScheduleSessionInput } from "@shared/schemas";
import type { Clock } from "./clock";
import { selectInvitees, sessionEligibilityPolicies, type EligibilityPredicate } from "./eligibility";
import { EngagementError, notFound } from "./errors";
import type { EventBus } from "./event-bus";
import type { InviteDispatcher } from "./invite-dispatcher";
import type { CustomerDirectory, SessionRepository, TimeWindow } from "./repositories";
import defaultLogger, { type ServiceLogger } from "../logger";

export const DEFAULT_UPCOMING_LIMIT = 10;

interface SessionCatalogOptions {
  sessions: SessionRepository;
  customers: CustomerDirectory;
  clock: Clock;
  dispatcher?: InviteDispatcher;
  events?: EventBus;
  logger?: ServiceLogger;
  policies?: Readonly<Record<SessionType, EligibilityPredicate>>;
}

export class SessionCatalog {
  private readonly logger: ServiceLogger;

  constructor(private readonly options: SessionCatalogOptions) {
    this.logger = options.logger ?? defaultLogger;
  }

  async schedule(input: ScheduleSessionInput): Promise<Session> {
    const parsed = scheduleSessionSchema.safeParse(input);
    if (!parsed.success) {
      throw new EngagementError("INVALID_INPUT", "Invalid session", { issues: parsed.error.issues });
    }
    const details = parsed.data;
    const now = this.options.clock.now();
    if (details.scheduledAt.getTime() < now.getTime() && !details.backdated) {
      throw new EngagementError("INVALID_INPUT", "Session cannot be scheduled in the past", {
        scheduledAt: details.scheduledAt.toISOString(),
      });
    }

    const session = await this.options.sessions.insert({
      id: sessionIdSchema.parse(randomUUID()),
      type: details.type,
      scheduledAt: details.scheduledAt,
      durationMinutes: details.durationMinutes,
      capacity: details.capacity,
      facilitators: details.facilitators,
      description: details.description,
      agenda: details.agenda,
      recordingUrl: details.recordingUrl ?? null,
      createdAt: now,
    });

    // Historical imports are recorded silently.
    const invited = details.backdated ? 0 : await this.inviteEligibleCustomers(session, now);

    this.logger.info(
      { sessionId: session.id, type: session.type, scheduledAt: session.scheduledAt.toISOString(), invited },
      "Scheduled office hours session",
    );
    this.options.events?.emit({
      category: "engagement.session",
      name: "scheduled",
      payload: {
        sessionId: session.id,
        type: session.type,
        scheduledAt: session.scheduledAt.toISOString(),
        capacity: session.capacity,
        invited,
      },
    });
    return session;
  }

  async get(id: SessionId): Promise<Session> {
    const session = await this.options.sessions.get(id);
    if (!session) {
      throw notFound("Session", id);
    }
    return session;
  }

  /** Sessions strictly after `now`, soonest first. */
  async upcoming(now: Date = this.options.clock.now(), limit: number = DEFAULT_UPCOMING_LIMIT): Promise<Session[]> {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new EngagementError("INVALID_INPUT", "limit must be a positive integer", { limit });
    }
    const sessions = await this.options.sessions.list({ from: now });
    return sessions.filter((session) => session.scheduledAt.getTime() > now.getTime()).slice(0, limit);
  }

  async list(window?: TimeWindow): Promise<Session[]> {
    return this.options.sessions.list(window);
  }

  private async inviteEligibleCustomers(session: Session, now: Date): Promise<number> {
    const dispatcher = this.options.dispatcher;
    if (!dispatcher) return 0;
    const customers = await this.options.customers.list();
    const invitees = selectInvitees(session.type, customers, now, this.options.policies ?? sessionEligibilityPolicies);
    for (const customer of invitees) {
      dispatcher.dispatch({ kind: "invitation", session, customer });
    }
    return invitees.length;
  }
}
