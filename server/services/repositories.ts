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

export interface TimeWindow {
  from?: Date;
  to?: Date;
}

export type NewCustomer = Omit<Customer, "createdAt" | "isActive" | "trustScore" | "lastEngagementAt"> & {
  trustScore?: number;
  lastEngagementAt?: Date | null;
};

export type CustomerUpdate = Partial<Pick<Customer, "trustScore" | "lastEngagementAt" | "isActive">>;

/** Source of customer records; the scheduler never invents customers. */
export interface CustomerDirectory {
  get(id: CustomerId): Promise<Customer | null>;
  list(options?: { includeInactive?: boolean }): Promise<Customer[]>;
  upsert(customer: NewCustomer): Promise<Customer>;
  update(id: CustomerId, updates: CustomerUpdate): Promise<Customer | null>;
}

export interface SessionRepository {
  insert(session: Session): Promise<Session>;
  get(id: SessionId): Promise<Session | null>;
  /** Sessions with `from <= scheduledAt < to`, ascending by time. */
  list(window?: TimeWindow): Promise<Session[]>;
}

export interface RegistrationRepository {
  insert(registration: Registration): Promise<Registration>;
  find(sessionId: SessionId, customerId: CustomerId): Promise<Registration | null>;
  update(registration: Registration): Promise<Registration>;
  countBySession(sessionId: SessionId): Promise<number>;
  listBySessions(sessionIds: SessionId[]): Promise<Registration[]>;
  listByCustomer(customerId: CustomerId): Promise<Registration[]>;
}

export interface FollowUpRepository {
  insert(action: FollowUpAction): Promise<FollowUpAction>;
  get(id: FollowUpId): Promise<FollowUpAction | null>;
  update(action: FollowUpAction): Promise<FollowUpAction>;
  listBySessions(sessionIds: SessionId[]): Promise<FollowUpAction[]>;
}

export interface OutreachRepository {
  insert(outreach: Outreach): Promise<Outreach>;
  get(id: OutreachId): Promise<Outreach | null>;
  update(outreach: Outreach): Promise<Outreach>;
  listByCustomer(customerId: CustomerId): Promise<Outreach[]>;
  /** Outreach with `from <= scheduledFor < to`. */
  list(window?: TimeWindow): Promise<Outreach[]>;
}

export interface EngagementStore {
  customers: CustomerDirectory;
  sessions: SessionRepository;
  registrations: RegistrationRepository;
  followUps: FollowUpRepository;
  outreach: OutreachRepository;
}

export function withinWindow(value: Date, window: TimeWindow = {}): boolean {
  const time = value.getTime();
  if (window.from && time < window.from.getTime()) return false;
  if (window.to && time >= window.to.getTime()) return false;
  return true;
}
