import type { CustomerId } from "@shared/schema";
import { RATING_MAX, RATING_MIN } from "@shared/schemas";
import type { Clock } from "./clock";
import type { EventBus } from "./event-bus";
import { EngagementError, notFound } from "./errors";
import { KeyedMutex } from "./keyed-mutex";
import type { CustomerDirectory } from "./repositories";
import defaultLogger, { type ServiceLogger } from "../logger";

export const TRUST_SCORE_MIN = 1;
export const TRUST_SCORE_MAX = 10;
export const TRUST_SCORE_DEFAULT = 5;

const RATING_MIDPOINT = (RATING_MIN + RATING_MAX) / 2;
const RATING_STEP = 0.5;
const MAX_DIRECT_DELTA = TRUST_SCORE_MAX - TRUST_SCORE_MIN;

export type TrustSignal =
  | { source: "feedback"; rating: number }
  | { source: "outreach"; delta: number };

export function clampTrustScore(score: number): number {
  const bounded = Math.max(TRUST_SCORE_MIN, Math.min(TRUST_SCORE_MAX, score));
  return Math.round(bounded * 100) / 100;
}

export function ratingAdjustment(rating: number): number {
  if (!Number.isInteger(rating) || rating < RATING_MIN || rating > RATING_MAX) {
    throw new EngagementError("INVALID_INPUT", `Rating must be an integer between ${RATING_MIN} and ${RATING_MAX}`, {
      rating,
    });
  }
  return (rating - RATING_MIDPOINT) * RATING_STEP;
}

export function signalAdjustment(signal: TrustSignal): number {
  switch (signal.source) {
    case "feedback":
      return ratingAdjustment(signal.rating);
    case "outreach":
      if (!Number.isFinite(signal.delta) || Math.abs(signal.delta) > MAX_DIRECT_DELTA) {
        throw new EngagementError("INVALID_INPUT", `Trust delta must be within ±${MAX_DIRECT_DELTA}`, {
          delta: signal.delta,
        });
      }
      return signal.delta;
  }
}

/** Folds signals into a score, clamping after each one. */
export function applySignals(score: number, signals: readonly TrustSignal[]): number {
  return signals.reduce((current, signal) => clampTrustScore(current + signalAdjustment(signal)), clampTrustScore(score));
}

interface TrustScoreEngineOptions {
  customers: CustomerDirectory;
  clock: Clock;
  mutex?: KeyedMutex;
  events?: EventBus;
  logger?: ServiceLogger;
}

export class TrustScoreEngine {
  private readonly mutex: KeyedMutex;
  private readonly logger: ServiceLogger;

  constructor(private readonly options: TrustScoreEngineOptions) {
    this.mutex = options.mutex ?? new KeyedMutex();
    this.logger = options.logger ?? defaultLogger;
  }

  async apply(customerId: CustomerId, ...signals: TrustSignal[]): Promise<number> {
    // Signals are checked before the lock is taken.
    for (const signal of signals) {
      signalAdjustment(signal);
    }

    return this.mutex.run(`customer:${customerId}`, async () => {
      const customer = await this.options.customers.get(customerId);
      if (!customer) {
        throw notFound("Customer", customerId);
      }

      const previousScore = customer.trustScore;
      const score = applySignals(previousScore, signals);
      await this.options.customers.update(customerId, {
        trustScore: score,
        lastEngagementAt: this.options.clock.now(),
      });

      this.logger.info({ customerId, previousScore, score }, "Updated trust score");
      this.options.events?.emit({
        category: "engagement.trust",
        name: "score_changed",
        payload: {
          customerId,
          previousScore,
          score,
          signals: signals.map((signal) => signal.source),
        },
      });
      return score;
    });
  }
}
