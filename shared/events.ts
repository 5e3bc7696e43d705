import { z } from "zod";
import { followUpStatusEnum, sessionTypeEnum } from "./schema";

const actorSchema = z
  .object({
    actorId: z.string().min(1).optional(),
    actorType: z.enum(["system", "user", "automation"]).optional(),
  })
  .strict();

const baseEventSchema = z.object({
  eventId: z.string().uuid(),
  occurredAt: z.string().datetime(),
  source: z.string().min(1),
  schemaVersion: z.string().min(1),
  actor: actorSchema.optional(),
});

const sessionPayloadSchema = z
  .object({
    sessionId: z.string().min(1),
    type: z.enum(sessionTypeEnum),
    scheduledAt: z.string().datetime(),
    capacity: z.number().int().positive(),
    invited: z.number().int().nonnegative().optional(),
  })
  .strict();

const registrationPayloadSchema = z
  .object({
    sessionId: z.string().min(1),
    customerId: z.string().min(1),
    attended: z.boolean().optional(),
    rating: z.number().int().optional().nullable(),
    followUpId: z.string().optional(),
    followUpStatus: z.enum(followUpStatusEnum).optional(),
  })
  .strict();

const outreachPayloadSchema = z
  .object({
    outreachId: z.string().min(1),
    customerId: z.string().min(1),
    executiveName: z.string().min(1),
    trustDelta: z.number().optional().nullable(),
  })
  .strict();

const trustPayloadSchema = z
  .object({
    customerId: z.string().min(1),
    previousScore: z.number(),
    score: z.number(),
    signals: z.array(z.enum(["feedback", "outreach"])),
  })
  .strict();

export const sessionEventSchema = baseEventSchema.extend({
  category: z.literal("engagement.session"),
  name: z.enum(["scheduled"]),
  payload: sessionPayloadSchema,
});

export const registrationEventSchema = baseEventSchema.extend({
  category: z.literal("engagement.registration"),
  name: z.enum(["registered", "attendance_recorded", "follow_up_added", "follow_up_advanced"]),
  payload: registrationPayloadSchema,
});

export const outreachEventSchema = baseEventSchema.extend({
  category: z.literal("engagement.outreach"),
  name: z.enum(["scheduled", "completed"]),
  payload: outreachPayloadSchema,
});

export const trustEventSchema = baseEventSchema.extend({
  category: z.literal("engagement.trust"),
  name: z.enum(["score_changed"]),
  payload: trustPayloadSchema,
});

export const engagementEventSchema = z.discriminatedUnion("category", [
  sessionEventSchema,
  registrationEventSchema,
  outreachEventSchema,
  trustEventSchema,
]);

export type EngagementEvent = z.infer<typeof engagementEventSchema>;
export type SessionEvent = z.infer<typeof sessionEventSchema>;
export type RegistrationEvent = z.infer<typeof registrationEventSchema>;
export type OutreachEvent = z.infer<typeof outreachEventSchema>;
export type TrustEvent = z.infer<typeof trustEventSchema>;

export type EngagementEventCategory = EngagementEvent["category"];
