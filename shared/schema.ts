import { sql } from "drizzle-orm";
import {
  pgTable,
  text,
  integer,
  doublePrecision,
  timestamp,
  jsonb,
  boolean,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { z } from "zod";

const timestamptz = (name: string) => timestamp(name, { withTimezone: true });

export const customerSegmentEnum = ["enterprise", "business", "startup"] as const;
export const incidentImpactEnum = ["high", "medium", "low"] as const;
export const sessionTypeEnum = ["emergency", "regular", "executive", "power_user"] as const;
export const followUpStatusEnum = ["pending", "in_progress", "completed"] as const;
export const priorityEnum = ["high", "medium", "low"] as const;

export type CustomerSegment = (typeof customerSegmentEnum)[number];
export type IncidentImpact = (typeof incidentImpactEnum)[number];
export type SessionType = (typeof sessionTypeEnum)[number];
export type FollowUpStatus = (typeof followUpStatusEnum)[number];
export type Priority = (typeof priorityEnum)[number];

export const customerIdSchema = z.string().min(1).brand<"CustomerId">();
export const sessionIdSchema = z.string().min(1).brand<"SessionId">();
export const registrationIdSchema = z.string().min(1).brand<"RegistrationId">();
export const outreachIdSchema = z.string().min(1).brand<"OutreachId">();
export const followUpIdSchema = z.string().min(1).brand<"FollowUpId">();

export type CustomerId = z.infer<typeof customerIdSchema>;
export type SessionId = z.infer<typeof sessionIdSchema>;
export type RegistrationId = z.infer<typeof registrationIdSchema>;
export type OutreachId = z.infer<typeof outreachIdSchema>;
export type FollowUpId = z.infer<typeof followUpIdSchema>;

export interface ContactInfo {
  name: string;
  email: string;
  phone?: string | null;
  role: string;
  timezone: string;
}

export interface SessionFeedback {
  rating: number;
  helpfulnessScore: number;
  comments: string;
  suggestedTopics: string[];
  willAttendFuture: boolean;
}

export const customers = pgTable(
  "engagement_customers",
  {
    id: text("id").$type<CustomerId>().primaryKey(),
    name: text("name").notNull(),
    segment: text("segment").$type<CustomerSegment>().notNull(),
    contractValue: doublePrecision("contract_value").notNull().default(0),
    incidentImpact: text("incident_impact").$type<IncidentImpact>().notNull(),
    primaryContact: jsonb("primary_contact").$type<ContactInfo>().notNull(),
    successManager: text("success_manager").notNull(),
    lastEngagementAt: timestamptz("last_engagement_at"),
    trustScore: doublePrecision("trust_score").notNull().default(5),
    isActive: boolean("is_active").notNull().default(true),
    createdAt: timestamptz("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  },
  (table) => ({
    segmentIdx: index("engagement_customers_segment_idx").on(table.segment),
  }),
);

export const engagementSessions = pgTable(
  "engagement_sessions",
  {
    id: text("id").$type<SessionId>().primaryKey(),
    type: text("type").$type<SessionType>().notNull(),
    scheduledAt: timestamptz("scheduled_at").notNull(),
    durationMinutes: integer("duration_minutes").notNull(),
    capacity: integer("capacity").notNull(),
    facilitators: jsonb("facilitators").$type<string[]>().default(sql`'[]'::jsonb`).notNull(),
    description: text("description").notNull().default(""),
    agenda: jsonb("agenda").$type<string[]>().default(sql`'[]'::jsonb`).notNull(),
    recordingUrl: text("recording_url"),
    createdAt: timestamptz("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  },
  (table) => ({
    scheduledIdx: index("engagement_sessions_scheduled_idx").on(table.scheduledAt),
  }),
);

export const sessionRegistrations = pgTable(
  "session_registrations",
  {
    id: text("id").$type<RegistrationId>().primaryKey(),
    sessionId: text("session_id")
      .$type<SessionId>()
      .references(() => engagementSessions.id)
      .notNull(),
    customerId: text("customer_id")
      .$type<CustomerId>()
      .references(() => customers.id)
      .notNull(),
    contactName: text("contact_name").notNull(),
    email: text("email").notNull(),
    registeredAt: timestamptz("registered_at").notNull(),
    attended: boolean("attended").notNull().default(false),
    questions: jsonb("questions").$type<string[]>().default(sql`'[]'::jsonb`).notNull(),
    feedback: jsonb("feedback").$type<SessionFeedback | null>(),
  },
  (table) => ({
    sessionCustomerUnique: uniqueIndex("session_registrations_session_customer_unique").on(
      table.sessionId,
      table.customerId,
    ),
  }),
);

export const followUpActions = pgTable(
  "follow_up_actions",
  {
    id: text("id").$type<FollowUpId>().primaryKey(),
    sessionId: text("session_id")
      .$type<SessionId>()
      .references(() => engagementSessions.id)
      .notNull(),
    customerId: text("customer_id")
      .$type<CustomerId>()
      .references(() => customers.id)
      .notNull(),
    action: text("action").notNull(),
    assignedTo: text("assigned_to").notNull(),
    dueDate: timestamptz("due_date").notNull(),
    priority: text("priority").$type<Priority>().notNull(),
    status: text("status").$type<FollowUpStatus>().notNull().default("pending"),
    createdAt: timestamptz("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
    updatedAt: timestamptz("updated_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  },
  (table) => ({
    sessionIdx: index("follow_up_actions_session_idx").on(table.sessionId),
  }),
);

export const executiveOutreach = pgTable(
  "executive_outreach",
  {
    id: text("id").$type<OutreachId>().primaryKey(),
    customerId: text("customer_id")
      .$type<CustomerId>()
      .references(() => customers.id)
      .notNull(),
    executiveName: text("executive_name").notNull(),
    executiveRole: text("executive_role").notNull(),
    scheduledFor: timestamptz("scheduled_for").notNull(),
    completedAt: timestamptz("completed_at"),
    durationMinutes: integer("duration_minutes"),
    outcome: text("outcome"),
    followUpRequired: boolean("follow_up_required").notNull().default(true),
    trustDelta: doublePrecision("trust_delta"),
  },
  (table) => ({
    customerIdx: index("executive_outreach_customer_idx").on(table.customerId),
  }),
);

export type Customer = typeof customers.$inferSelect;
export type Session = typeof engagementSessions.$inferSelect;
export type Registration = typeof sessionRegistrations.$inferSelect;
export type FollowUpAction = typeof followUpActions.$inferSelect;
export type Outreach = typeof executiveOutreach.$inferSelect;
