import { and, asc, count, eq, gte, inArray, lt, sql, type SQL } from "drizzle-orm";
import type { PgColumn } from "drizzle-orm/pg-core";
import {
  customers,
  engagementSessions,
  executiveOutreach,
  followUpActions,
  sessionRegistrations,
  type Customer,
  type CustomerId,
  type FollowUpAction,
  type FollowUpId,
  type Outreach,
  type OutreachId,
  type Registration,
  type Session,
  type SessionId,
} from "@shared/schema";
import type { Database } from "../db";
import type {
  CustomerDirectory,
  CustomerUpdate,
  EngagementStore,
  FollowUpRepository,
  NewCustomer,
  OutreachRepository,
  RegistrationRepository,
  SessionRepository,
  TimeWindow,
} from "./repositories";
import { TRUST_SCORE_DEFAULT } from "./trust-score";

function windowConditions(column: PgColumn, window: TimeWindow = {}): SQL | undefined {
  const conditions: SQL[] = [];
  if (window.from) conditions.push(gte(column, window.from));
  if (window.to) conditions.push(lt(column, window.to));
  return conditions.length ? and(...conditions) : undefined;
}

function single<T>(rows: T[], what: string): T {
  const [row] = rows;
  if (!row) {
    throw new Error(`${what} was not returned by the database`);
  }
  return row;
}

export async function ensureSchema(db: Database): Promise<void> {
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS engagement_customers (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      segment TEXT NOT NULL,
      contract_value DOUBLE PRECISION NOT NULL DEFAULT 0,
      incident_impact TEXT NOT NULL,
      primary_contact JSONB NOT NULL,
      success_manager TEXT NOT NULL,
      last_engagement_at TIMESTAMPTZ,
      trust_score DOUBLE PRECISION NOT NULL DEFAULT 5,
      is_active BOOLEAN NOT NULL DEFAULT TRUE,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS engagement_sessions (
      id TEXT PRIMARY KEY,
      type TEXT NOT NULL,
      scheduled_at TIMESTAMPTZ NOT NULL,
      duration_minutes INTEGER NOT NULL,
      capacity INTEGER NOT NULL,
      facilitators JSONB NOT NULL DEFAULT '[]'::jsonb,
      description TEXT NOT NULL DEFAULT '',
      agenda JSONB NOT NULL DEFAULT '[]'::jsonb,
      recording_url TEXT,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS session_registrations (
      id TEXT PRIMARY KEY,
      session_id TEXT NOT NULL REFERENCES engagement_sessions(id),
      customer_id TEXT NOT NULL REFERENCES engagement_customers(id),
      contact_name TEXT NOT NULL,
      email TEXT NOT NULL,
      registered_at TIMESTAMPTZ NOT NULL,
      attended BOOLEAN NOT NULL DEFAULT FALSE,
      questions JSONB NOT NULL DEFAULT '[]'::jsonb,
      feedback JSONB,
      UNIQUE(session_id, customer_id)
    )
  `);
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS follow_up_actions (
      id TEXT PRIMARY KEY,
      session_id TEXT NOT NULL REFERENCES engagement_sessions(id),
      customer_id TEXT NOT NULL REFERENCES engagement_customers(id),
      action TEXT NOT NULL,
      assigned_to TEXT NOT NULL,
      due_date TIMESTAMPTZ NOT NULL,
      priority TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'pending',
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS executive_outreach (
      id TEXT PRIMARY KEY,
      customer_id TEXT NOT NULL REFERENCES engagement_customers(id),
      executive_name TEXT NOT NULL,
      executive_role TEXT NOT NULL,
      scheduled_for TIMESTAMPTZ NOT NULL,
      completed_at TIMESTAMPTZ,
      duration_minutes INTEGER,
      outcome TEXT,
      follow_up_required BOOLEAN NOT NULL DEFAULT TRUE,
      trust_delta DOUBLE PRECISION
    )
  `);
}

export class PostgresCustomerDirectory implements CustomerDirectory {
  constructor(private readonly db: Database) {}

  async get(id: CustomerId): Promise<Customer | null> {
    const [row] = await this.db.select().from(customers).where(eq(customers.id, id));
    return row ?? null;
  }

  async list(options: { includeInactive?: boolean } = {}): Promise<Customer[]> {
    return this.db
      .select()
      .from(customers)
      .where(options.includeInactive ? undefined : eq(customers.isActive, true));
  }

  async upsert(customer: NewCustomer): Promise<Customer> {
    const profile = {
      name: customer.name,
      segment: customer.segment,
      contractValue: customer.contractValue,
      incidentImpact: customer.incidentImpact,
      primaryContact: customer.primaryContact,
      successManager: customer.successManager,
    };
    const rows = await this.db
      .insert(customers)
      .values({
        id: customer.id,
        ...profile,
        trustScore: customer.trustScore ?? TRUST_SCORE_DEFAULT,
        lastEngagementAt: customer.lastEngagementAt ?? null,
      })
      .onConflictDoUpdate({ target: customers.id, set: profile })
      .returning();
    return single(rows, "Customer");
  }

  async update(id: CustomerId, updates: CustomerUpdate): Promise<Customer | null> {
    const [row] = await this.db.update(customers).set(updates).where(eq(customers.id, id)).returning();
    return row ?? null;
  }
}

export class PostgresSessionRepository implements SessionRepository {
  constructor(private readonly db: Database) {}

  async insert(session: Session): Promise<Session> {
    return single(await this.db.insert(engagementSessions).values(session).returning(), "Session");
  }

  async get(id: SessionId): Promise<Session | null> {
    const [row] = await this.db.select().from(engagementSessions).where(eq(engagementSessions.id, id));
    return row ?? null;
  }

  async list(window?: TimeWindow): Promise<Session[]> {
    return this.db
      .select()
      .from(engagementSessions)
      .where(windowConditions(engagementSessions.scheduledAt, window))
      .orderBy(asc(engagementSessions.scheduledAt));
  }
}

export class PostgresRegistrationRepository implements RegistrationRepository {
  constructor(private readonly db: Database) {}

  async insert(registration: Registration): Promise<Registration> {
    return single(await this.db.insert(sessionRegistrations).values(registration).returning(), "Registration");
  }

  async find(sessionId: SessionId, customerId: CustomerId): Promise<Registration | null> {
    const [row] = await this.db
      .select()
      .from(sessionRegistrations)
      .where(and(eq(sessionRegistrations.sessionId, sessionId), eq(sessionRegistrations.customerId, customerId)));
    return row ?? null;
  }

  async update(registration: Registration): Promise<Registration> {
    const { id, ...changes } = registration;
    const rows = await this.db
      .update(sessionRegistrations)
      .set(changes)
      .where(eq(sessionRegistrations.id, id))
      .returning();
    return single(rows, `Registration ${id}`);
  }

  async countBySession(sessionId: SessionId): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(sessionRegistrations)
      .where(eq(sessionRegistrations.sessionId, sessionId));
    return row?.value ?? 0;
  }

  async listBySessions(sessionIds: SessionId[]): Promise<Registration[]> {
    if (!sessionIds.length) return [];
    return this.db.select().from(sessionRegistrations).where(inArray(sessionRegistrations.sessionId, sessionIds));
  }

  async listByCustomer(customerId: CustomerId): Promise<Registration[]> {
    return this.db.select().from(sessionRegistrations).where(eq(sessionRegistrations.customerId, customerId));
  }
}

export class PostgresFollowUpRepository implements FollowUpRepository {
  constructor(private readonly db: Database) {}

  async insert(action: FollowUpAction): Promise<FollowUpAction> {
    return single(await this.db.insert(followUpActions).values(action).returning(), "Follow-up action");
  }

  async get(id: FollowUpId): Promise<FollowUpAction | null> {
    const [row] = await this.db.select().from(followUpActions).where(eq(followUpActions.id, id));
    return row ?? null;
  }

  async update(action: FollowUpAction): Promise<FollowUpAction> {
    const { id, ...changes } = action;
    const rows = await this.db.update(followUpActions).set(changes).where(eq(followUpActions.id, id)).returning();
    return single(rows, `Follow-up action ${id}`);
  }

  async listBySessions(sessionIds: SessionId[]): Promise<FollowUpAction[]> {
    if (!sessionIds.length) return [];
    return this.db.select().from(followUpActions).where(inArray(followUpActions.sessionId, sessionIds));
  }
}

export class PostgresOutreachRepository implements OutreachRepository {
  constructor(private readonly db: Database) {}

  async insert(outreach: Outreach): Promise<Outreach> {
    return single(await this.db.insert(executiveOutreach).values(outreach).returning(), "Outreach");
  }

  async get(id: OutreachId): Promise<Outreach | null> {
    const [row] = await this.db.select().from(executiveOutreach).where(eq(executiveOutreach.id, id));
    return row ?? null;
  }

  async update(outreach: Outreach): Promise<Outreach> {
    const { id, ...changes } = outreach;
    const rows = await this.db.update(executiveOutreach).set(changes).where(eq(executiveOutreach.id, id)).returning();
    return single(rows, `Outreach ${id}`);
  }

  async listByCustomer(customerId: CustomerId): Promise<Outreach[]> {
    return this.db
      .select()
      .from(executiveOutreach)
      .where(eq(executiveOutreach.customerId, customerId))
      .orderBy(asc(executiveOutreach.scheduledFor));
  }

  async list(window?: TimeWindow): Promise<Outreach[]> {
    return this.db.select().from(executiveOutreach).where(windowConditions(executiveOutreach.scheduledFor, window));
  }
}

export async function createPostgresStore(db: Database): Promise<EngagementStore> {
  await ensureSchema(db);
  return {
    customers: new PostgresCustomerDirectory(db),
    sessions: new PostgresSessionRepository(db),
    registrations: new PostgresRegistrationRepository(db),
    followUps: new PostgresFollowUpRepository(db),
    outreach: new PostgresOutreachRepository(db),
  };
}
