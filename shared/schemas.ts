import { z } from "zod";
import {
  customerIdSchema,
  customerSegmentEnum,
  followUpStatusEnum,
  incidentImpactEnum,
  priorityEnum,
  sessionTypeEnum,
} from "./schema";

export const RATING_MIN = 1;
export const RATING_MAX = 5;
export const HELPFULNESS_MIN = 1;
export const HELPFULNESS_MAX = 10;

export const contactInfoSchema = z.object({
  name: z.string().min(1, "Contact name is required"),
  email: z.string().email(),
  phone: z.string().min(1).nullish(),
  role: z.string().min(1),
  timezone: z.string().min(1).default("UTC"),
});

export const customerFormSchema = z.object({
  id: customerIdSchema,
  name: z.string().min(1, "Name is required"),
  segment: z.enum(customerSegmentEnum),
  contractValue: z.coerce.number().nonnegative(),
  incidentImpact: z.enum(incidentImpactEnum),
  primaryContact: contactInfoSchema,
  successManager: z.string().min(1),
  lastEngagementAt: z.coerce.date().nullish(),
  trustScore: z.number().min(1).max(10).optional(),
});

export const sessionFeedbackSchema = z.object({
  rating: z.number().int().min(RATING_MIN).max(RATING_MAX),
  helpfulnessScore: z.number().int().min(HELPFULNESS_MIN).max(HELPFULNESS_MAX),
  comments: z.string().default(""),
  suggestedTopics: z.array(z.string()).default([]),
  willAttendFuture: z.boolean().default(false),
});

export const scheduleSessionSchema = z.object({
  type: z.enum(sessionTypeEnum),
  scheduledAt: z.coerce.date(),
  durationMinutes: z.number().int().positive(),
  capacity: z.number().int().positive(),
  facilitators: z.array(z.string().min(1)).default([]),
  description: z.string().default(""),
  agenda: z.array(z.string()).default([]),
  recordingUrl: z.string().url().nullish(),
  backdated: z.boolean().default(false),
});

export const registrationRequestSchema = z.object({
  customerId: customerIdSchema,
  email: z.string().email().optional(),
  questions: z.array(z.string().min(1)).default([]),
});

export const attendanceRequestSchema = z.object({
  customerId: customerIdSchema,
  attended: z.boolean(),
  feedback: sessionFeedbackSchema.optional(),
});

export const followUpRequestSchema = z.object({
  customerId: customerIdSchema,
  action: z.string().min(1),
  assignedTo: z.string().min(1),
  dueDate: z.coerce.date(),
  priority: z.enum(priorityEnum).default("medium"),
  status: z.enum(followUpStatusEnum).default("pending"),
});

export const followUpStatusUpdateSchema = z.object({
  status: z.enum(followUpStatusEnum),
});

export const outreachRequestSchema = z.object({
  customerId: customerIdSchema,
  executiveName: z.string().min(1),
  executiveRole: z.string().min(1),
  scheduledFor: z.coerce.date().optional(),
});

export const outreachCompletionSchema = z.object({
  outcome: z.string().min(1),
  trustDelta: z.number().finite(),
  durationMinutes: z.number().int().positive().optional(),
});

export const reportQuerySchema = z.object({
  start: z.string().min(1),
  end: z.string().min(1),
});

export const programRequestSchema = z.object({
  start: z.coerce.date().optional(),
});

export type ContactInfoInput = z.infer<typeof contactInfoSchema>;
export type CustomerFormInput = z.infer<typeof customerFormSchema>;
export type SessionFeedbackInput = z.input<typeof sessionFeedbackSchema>;
export type ScheduleSessionInput = z.input<typeof scheduleSessionSchema>;
export type PlannedSession = z.infer<typeof scheduleSessionSchema>;
export type FollowUpInput = z.input<typeof followUpRequestSchema>;
