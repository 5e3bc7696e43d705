import type {
  Customer,
  CustomerId,
  FollowUpAction,
  FollowUpId,
  Outreach,
  OutreachId,
  Registration,
  Session,
  SessionId,
} from "@shared/schema";
import { systemClock, type Clock } from "./clock";
import { TRUST_SCORE_DEFAULT } from "./trust-score";
import {
  withinWindow,
  type CustomerDirectory,
  type CustomerUpdate,
  type EngagementStore,
  type FollowUpRepository,
  type NewCustomer,
  type OutreachRepository,
  type RegistrationRepository,
  type SessionRepository,
  type TimeWindow,
} from "./repositories";

// Records are copied on the way in and out so callers never share mutable state.
const copy = <T>(value: T): T => structuredClone(value);

export class InMemoryCustomerDirectory implements CustomerDirectory {
  private readonly records = new Map<CustomerId, Customer>();

  constructor(private readonly clock: Clock = systemClock) {}

  async get(id: CustomerId): Promise<Customer | null> {
    const record = this.records.get(id);
    return record ? copy(record) : null;
  }

  async list(options: { includeInactive?: boolean } = {}): Promise<Customer[]> {
    return Array.from(this.records.values())
      .filter((customer) => options.includeInactive || customer.isActive)
      .map(copy);
  }

  async upsert(customer: NewCustomer): Promise<Customer> {
    const existing = this.records.get(customer.id);
    const record: Customer = existing
      ? {
          ...existing,
          name: customer.name,
          segment: customer.segment,
          contractValue: customer.contractValue,
          incidentImpact: customer.incidentImpact,
          primaryContact: customer.primaryContact,
          successManager: customer.successManager,
        }
      : {
          ...customer,
          trustScore: customer.trustScore ?? TRUST_SCORE_DEFAULT,
          lastEngagementAt: customer.lastEngagementAt ?? null,
          isActive: true,
          createdAt: this.clock.now(),
        };
    this.records.set(record.id, copy(record));
    return copy(record);
  }

  async update(id: CustomerId, updates: CustomerUpdate): Promise<Customer | null> {
    const existing = this.records.get(id);
    if (!existing) return null;
    const merged: Customer = { ...existing, ...updates };
    this.records.set(id, copy(merged));
    return copy(merged);
  }
}

export class InMemorySessionRepository implements SessionRepository {
  private readonly records = new Map<SessionId, Session>();

  async insert(session: Session): Promise<Session> {
    this.records.set(session.id, copy(session));
    return copy(session);
  }

  async get(id: SessionId): Promise<Session | null> {
    const record = this.records.get(id);
    return record ? copy(record) : null;
  }

  async list(window?: TimeWindow): Promise<Session[]> {
    return Array.from(this.records.values())
      .filter((session) => withinWindow(session.scheduledAt, window))
      .sort((a, b) => a.scheduledAt.getTime() - b.scheduledAt.getTime())
      .map(copy);
  }
}

export class InMemoryRegistrationRepository implements RegistrationRepository {
  private readonly records: Registration[] = [];

  async insert(registration: Registration): Promise<Registration> {
    this.records.push(copy(registration));
    return copy(registration);
  }

  async find(sessionId: SessionId, customerId: CustomerId): Promise<Registration | null> {
    const record = this.records.find((entry) => entry.sessionId === sessionId && entry.customerId === customerId);
    return record ? copy(record) : null;
  }

  async update(registration: Registration): Promise<Registration> {
    const index = this.records.findIndex((entry) => entry.id === registration.id);
    if (index === -1) {
      throw new Error(`Registration ${registration.id} does not exist`);
    }
    this.records[index] = copy(registration);
    return copy(registration);
  }

  async countBySession(sessionId: SessionId): Promise<number> {
    return this.records.filter((entry) => entry.sessionId === sessionId).length;
  }

  async listBySessions(sessionIds: SessionId[]): Promise<Registration[]> {
    const wanted = new Set(sessionIds);
    return this.records.filter((entry) => wanted.has(entry.sessionId)).map(copy);
  }

  async listByCustomer(customerId: CustomerId): Promise<Registration[]> {
    return this.records.filter((entry) => entry.customerId === customerId).map(copy);
  }
}

export class InMemoryFollowUpRepository implements FollowUpRepository {
  private readonly records = new Map<FollowUpId, FollowUpAction>();

  async insert(action: FollowUpAction): Promise<FollowUpAction> {
    this.records.set(action.id, copy(action));
    return copy(action);
  }

  async get(id: FollowUpId): Promise<FollowUpAction | null> {
    const record = this.records.get(id);
    return record ? copy(record) : null;
  }

  async update(action: FollowUpAction): Promise<FollowUpAction> {
    if (!this.records.has(action.id)) {
      throw new Error(`Follow-up action ${action.id} does not exist`);
    }
    this.records.set(action.id, copy(action));
    return copy(action);
  }

  async listBySessions(sessionIds: SessionId[]): Promise<FollowUpAction[]> {
    const wanted = new Set(sessionIds);
    return Array.from(this.records.values())
      .filter((action) => wanted.has(action.sessionId))
      .map(copy);
  }
}

export class InMemoryOutreachRepository implements OutreachRepository {
  private readonly records: Outreach[] = [];

  async insert(outreach: Outreach): Promise<Outreach> {
    this.records.push(copy(outreach));
    return copy(outreach);
  }

  async get(id: OutreachId): Promise<Outreach | null> {
    const record = this.records.find((entry) => entry.id === id);
    return record ? copy(record) : null;
  }

  async update(outreach: Outreach): Promise<Outreach> {
    const index = this.records.findIndex((entry) => entry.id === outreach.id);
    if (index === -1) {
      throw new Error(`Outreach ${outreach.id} does not exist`);
    }
    this.records[index] = copy(outreach);
    return copy(outreach);
  }

  async listByCustomer(customerId: CustomerId): Promise<Outreach[]> {
    return this.records.filter((entry) => entry.customerId === customerId).map(copy);
  }

  async list(window?: TimeWindow): Promise<Outreach[]> {
    return this.records.filter((entry) => withinWindow(entry.scheduledFor, window)).map(copy);
  }
}

export function createInMemoryStore(clock: Clock = systemClock): EngagementStore {
  return {
    customers: new InMemoryCustomerDirectory(clock),
    sessions: new InMemorySessionRepository(),
    registrations: new InMemoryRegistrationRepository(),
    followUps: new InMemoryFollowUpRepository(),
    outreach: new InMemoryOutreachRepository(),
  };
}
