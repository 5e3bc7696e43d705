import { randomUUID } from "node:crypto";
import { addDays } from "date-fns";
import { outreachIdSchema, type CustomerId, type Outreach, type OutreachId } from "@shared/schema";
import type { Clock } from "./clock";
import { isEligibleForExecutiveOutreach } from "./eligibility";
import { EngagementError, notFound } from "./errors";
import type { EventBus } from "./event-bus";
import { KeyedMutex } from "./keyed-mutex";
import type { CustomerDirectory, OutreachRepository } from "./repositories";
import { signalAdjustment, type TrustScoreEngine } from "./trust-score";
import defaultLogger, { type ServiceLogger } from "../logger";

export const DEFAULT_OUTREACH_LEAD_DAYS = 3;

export interface OutreachCompletion {
  outreach: Outreach;
  trustScore: number;
}

interface OutreachTrackerOptions {
  outreach: OutreachRepository;
  customers: CustomerDirectory;
  trust: TrustScoreEngine;
  clock: Clock;
  mutex?: KeyedMutex;
  events?: EventBus;
  logger?: ServiceLogger;
}

export class OutreachTracker {
  private readonly mutex: KeyedMutex;
  private readonly logger: ServiceLogger;

  constructor(private readonly options: OutreachTrackerOptions) {
    this.mutex = options.mutex ?? new KeyedMutex();
    this.logger = options.logger ?? defaultLogger;
  }

  async schedule(
    customerId: CustomerId,
    executiveName: string,
    executiveRole: string,
    scheduledFor?: Date,
  ): Promise<Outreach> {
    if (!executiveName.trim() || !executiveRole.trim()) {
      throw new EngagementError("INVALID_INPUT", "Executive name and role are required");
    }
    const customer = await this.options.customers.get(customerId);
    if (!customer) {
      throw notFound("Customer", customerId);
    }
    if (!isEligibleForExecutiveOutreach(customer)) {
      throw new EngagementError(
        "INVALID_SEGMENT",
        "Executive outreach is only available for enterprise customers",
        { customerId, segment: customer.segment },
      );
    }

    const outreach = await this.options.outreach.insert({
      id: outreachIdSchema.parse(randomUUID()),
      customerId,
      executiveName: executiveName.trim(),
      executiveRole: executiveRole.trim(),
      scheduledFor: scheduledFor ?? addDays(this.options.clock.now(), DEFAULT_OUTREACH_LEAD_DAYS),
      completedAt: null,
      durationMinutes: null,
      outcome: null,
      followUpRequired: true,
      trustDelta: null,
    });

    this.logger.info({ customerId, outreachId: outreach.id, executiveName }, "Scheduled executive outreach");
    this.options.events?.emit({
      category: "engagement.outreach",
      name: "scheduled",
      payload: { outreachId: outreach.id, customerId, executiveName: outreach.executiveName },
    });
    return outreach;
  }

  async complete(
    outreachId: OutreachId,
    outcome: string,
    trustDelta: number,
    durationMinutes?: number,
  ): Promise<OutreachCompletion> {
    if (!outcome.trim()) {
      throw new EngagementError("INVALID_INPUT", "Outcome is required");
    }
    signalAdjustment({ source: "outreach", delta: trustDelta });

    const outreach = await this.mutex.run(`outreach:${outreachId}`, async () => {
      const existing = await this.options.outreach.get(outreachId);
      if (!existing) {
        throw notFound("Outreach", outreachId);
      }
      if (existing.completedAt) {
        throw new EngagementError("ALREADY_COMPLETED", `Outreach ${outreachId} is already completed`, {
          outreachId,
          completedAt: existing.completedAt.toISOString(),
        });
      }
      return this.options.outreach.update({
        ...existing,
        completedAt: this.options.clock.now(),
        durationMinutes: durationMinutes ?? null,
        outcome: outcome.trim(),
        trustDelta,
      });
    });

    const trustScore = await this.options.trust.apply(outreach.customerId, { source: "outreach", delta: trustDelta });

    this.logger.info({ outreachId, customerId: outreach.customerId, trustDelta }, "Completed executive outreach");
    this.options.events?.emit({
      category: "engagement.outreach",
      name: "completed",
      payload: {
        outreachId,
        customerId: outreach.customerId,
        executiveName: outreach.executiveName,
        trustDelta,
      },
    });
    return { outreach, trustScore };
  }

  async listForCustomer(customerId: CustomerId): Promise<Outreach[]> {
    const customer = await this.options.customers.get(customerId);
    if (!customer) {
      throw notFound("Customer", customerId);
    }
    return this.options.outreach.listByCustomer(customerId);
  }
}
