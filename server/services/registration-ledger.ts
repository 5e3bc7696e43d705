import { randomUUID } from "node:crypto";
import {
  followUpIdSchema,
  registrationIdSchema,
  type Customer,
  type CustomerId,
  type FollowUpAction,
  type FollowUpId,
  type FollowUpStatus,
  type Registration,
  type Session,
  type SessionId,
} from "@shared/schema";
import {
  followUpRequestSchema,
  sessionFeedbackSchema,
  type FollowUpInput,
  type SessionFeedbackInput,
} from "@shared/schemas";
import type { Clock } from "./clock";
import { EngagementError, notFound } from "./errors";
import type { EventBus } from "./event-bus";
import type { InviteDispatcher } from "./invite-dispatcher";
import { KeyedMutex } from "./keyed-mutex";
import type {
  CustomerDirectory,
  FollowUpRepository,
  RegistrationRepository,
  SessionRepository,
} from "./repositories";
import type { TrustScoreEngine } from "./trust-score";
import defaultLogger, { type ServiceLogger } from "../logger";

export interface RegistrationRequest {
  email?: string;
  questions?: string[];
}

export interface AttendanceResult {
  registration: Registration;
  trustScore: number | null;
}

const followUpOrder: Record<FollowUpStatus, number> = {
  pending: 0,
  in_progress: 1,
  completed: 2,
};

export function canAdvanceFollowUp(from: FollowUpStatus, to: FollowUpStatus): boolean {
  return followUpOrder[to] > followUpOrder[from];
}

interface RegistrationLedgerOptions {
  sessions: SessionRepository;
  customers: CustomerDirectory;
  registrations: RegistrationRepository;
  followUps: FollowUpRepository;
  trust: TrustScoreEngine;
  clock: Clock;
  mutex?: KeyedMutex;
  dispatcher?: InviteDispatcher;
  events?: EventBus;
  logger?: ServiceLogger;
}

export class RegistrationLedger {
  private readonly mutex: KeyedMutex;
  private readonly logger: ServiceLogger;

  constructor(private readonly options: RegistrationLedgerOptions) {
    this.mutex = options.mutex ?? new KeyedMutex();
    this.logger = options.logger ?? defaultLogger;
  }

  async register(
    sessionId: SessionId,
    customerId: CustomerId,
    request: RegistrationRequest = {},
  ): Promise<Registration> {
    const registration = await this.mutex.run(`session:${sessionId}`, async () => {
      const session = await this.requireSession(sessionId);
      const customer = await this.requireCustomer(customerId);
      if (!customer.isActive) {
        throw new EngagementError("INACTIVE_CUSTOMER", `Customer ${customerId} is inactive`, { customerId });
      }

      const existing = await this.options.registrations.find(sessionId, customerId);
      if (existing) {
        throw new EngagementError("DUPLICATE_REGISTRATION", `Customer ${customerId} is already registered`, {
          sessionId,
          customerId,
          registrationId: existing.id,
        });
      }

      const count = await this.options.registrations.countBySession(sessionId);
      if (count >= session.capacity) {
        throw new EngagementError("FULL", `Session ${sessionId} is at capacity`, {
          sessionId,
          capacity: session.capacity,
        });
      }

      const created = await this.options.registrations.insert({
        id: registrationIdSchema.parse(randomUUID()),
        sessionId,
        customerId,
        contactName: customer.primaryContact.name,
        email: request.email ?? customer.primaryContact.email,
        registeredAt: this.options.clock.now(),
        attended: false,
        questions: request.questions ?? [],
        feedback: null,
      });

      this.options.dispatcher?.dispatch({
        kind: "confirmation",
        session,
        customer,
        email: created.email,
      });
      return created;
    });

    this.logger.info({ sessionId, customerId }, "Registered customer for session");
    this.options.events?.emit({
      category: "engagement.registration",
      name: "registered",
      payload: { sessionId, customerId },
    });
    return registration;
  }

  async recordAttendance(
    sessionId: SessionId,
    customerId: CustomerId,
    attended: boolean,
    feedbackInput?: SessionFeedbackInput,
  ): Promise<AttendanceResult> {
    const feedback = feedbackInput === undefined ? null : this.parseFeedback(feedbackInput);

    const registration = await this.mutex.run(`session:${sessionId}`, async () => {
      await this.requireSession(sessionId);
      const existing = await this.options.registrations.find(sessionId, customerId);
      if (!existing) {
        throw notFound("Registration", `${sessionId}/${customerId}`);
      }
      if (feedback && existing.feedback) {
        throw new EngagementError("FEEDBACK_ALREADY_SUBMITTED", "Feedback has already been submitted", {
          sessionId,
          customerId,
        });
      }
      return this.options.registrations.update({
        ...existing,
        attended,
        feedback: feedback ?? existing.feedback,
      });
    });

    const trustScore =
      attended && feedback
        ? await this.options.trust.apply(customerId, { source: "feedback", rating: feedback.rating })
        : null;

    this.options.events?.emit({
      category: "engagement.registration",
      name: "attendance_recorded",
      payload: { sessionId, customerId, attended, rating: feedback?.rating ?? null },
    });
    return { registration, trustScore };
  }

  async addFollowUp(sessionId: SessionId, input: FollowUpInput): Promise<FollowUpAction> {
    const parsed = followUpRequestSchema.safeParse(input);
    if (!parsed.success) {
      throw new EngagementError("INVALID_INPUT", "Invalid follow-up action", { issues: parsed.error.issues });
    }
    const followUp = parsed.data;
    await this.requireSession(sessionId);
    await this.requireCustomer(followUp.customerId);

    const now = this.options.clock.now();
    const action = await this.options.followUps.insert({
      id: followUpIdSchema.parse(randomUUID()),
      sessionId,
      customerId: followUp.customerId,
      action: followUp.action,
      assignedTo: followUp.assignedTo,
      dueDate: followUp.dueDate,
      priority: followUp.priority,
      status: followUp.status,
      createdAt: now,
      updatedAt: now,
    });

    this.logger.info({ sessionId, customerId: followUp.customerId, followUpId: action.id }, "Added follow-up action");
    this.options.events?.emit({
      category: "engagement.registration",
      name: "follow_up_added",
      payload: { sessionId, customerId: followUp.customerId, followUpId: action.id, followUpStatus: action.status },
    });
    return action;
  }

  async advanceFollowUp(actionId: FollowUpId, status: FollowUpStatus): Promise<FollowUpAction> {
    const updated = await this.mutex.run(`follow-up:${actionId}`, async () => {
      const action = await this.options.followUps.get(actionId);
      if (!action) {
        throw notFound("Follow-up action", actionId);
      }
      if (!canAdvanceFollowUp(action.status, status)) {
        throw new EngagementError("INVALID_TRANSITION", `Cannot move follow-up from ${action.status} to ${status}`, {
          from: action.status,
          to: status,
        });
      }
      return this.options.followUps.update({ ...action, status, updatedAt: this.options.clock.now() });
    });

    this.options.events?.emit({
      category: "engagement.registration",
      name: "follow_up_advanced",
      payload: {
        sessionId: updated.sessionId,
        customerId: updated.customerId,
        followUpId: updated.id,
        followUpStatus: updated.status,
      },
    });
    return updated;
  }

  async listRegistrations(sessionId: SessionId): Promise<Registration[]> {
    await this.requireSession(sessionId);
    return this.options.registrations.listBySessions([sessionId]);
  }

  async listFollowUps(sessionId: SessionId): Promise<FollowUpAction[]> {
    await this.requireSession(sessionId);
    return this.options.followUps.listBySessions([sessionId]);
  }

  private parseFeedback(input: SessionFeedbackInput) {
    const parsed = sessionFeedbackSchema.safeParse(input);
    if (!parsed.success) {
      throw new EngagementError("INVALID_INPUT", "Invalid feedback", { issues: parsed.error.issues });
    }
    return parsed.data;
  }

  private async requireSession(sessionId: SessionId): Promise<Session> {
    const session = await this.options.sessions.get(sessionId);
    if (!session) {
      throw notFound("Session", sessionId);
    }
    return session;
  }

  private async requireCustomer(customerId: CustomerId): Promise<Customer> {
    const customer = await this.options.customers.get(customerId);
    if (!customer) {
      throw notFound("Customer", customerId);
    }
    return customer;
  }
}
