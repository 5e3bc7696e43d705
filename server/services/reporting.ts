import type {
  Customer,
  CustomerId,
  CustomerSegment,
  FollowUpStatus,
  Registration,
  SessionType,
} from "@shared/schema";
import { EngagementError, notFound } from "./errors";
import type { EngagementStore } from "./repositories";
import { TRUST_SCORE_DEFAULT } from "./trust-score";

export interface SegmentEngagement {
  registrations: number;
  attended: number;
  attendanceRate: number;
}

export interface EngagementReport {
  period: { start: Date; end: Date };
  totalSessions: number;
  totalRegistrations: number;
  totalAttendees: number;
  /** Percentage of registrations that attended. */
  attendanceRate: number;
  averageRating: number;
  customersBySegment: Record<CustomerSegment, SegmentEngagement>;
  sessionsByType: Record<SessionType, number>;
  trustScoreChanges: { improved: number; declined: number; average: number };
  executiveOutreachCount: number;
  followUpActionStatus: Record<FollowUpStatus, number>;
}

export interface CustomerEngagementSummary {
  customer: Customer;
  totalRegistrations: number;
  totalAttended: number;
  attendanceRate: number;
  averageRating: number;
  lastEngagementAt: Date | null;
  currentTrustScore: number;
  outreachCount: number;
}

const round2 = (value: number) => Math.round(value * 100) / 100;

export function percentage(part: number, whole: number): number {
  return whole > 0 ? round2((part / whole) * 100) : 0;
}

export function mean(values: readonly number[]): number {
  return values.length ? round2(values.reduce((sum, value) => sum + value, 0) / values.length) : 0;
}

function submittedRatings(registrations: readonly Registration[]): number[] {
  return registrations.flatMap((registration) => (registration.feedback ? [registration.feedback.rating] : []));
}

function toDate(value: Date | string, label: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new EngagementError("INVALID_RANGE", `${label} is not a valid date`, { [label]: String(value) });
  }
  return date;
}

export function parseReportWindow(start: Date | string, end: Date | string): { start: Date; end: Date } {
  const from = toDate(start, "start");
  const to = toDate(end, "end");
  if (from.getTime() > to.getTime()) {
    throw new EngagementError("INVALID_RANGE", "start must not be after end", {
      start: from.toISOString(),
      end: to.toISOString(),
    });
  }
  return { start: from, end: to };
}

/**
 * Read-only rollups over the store. Holds no state; every call reads a fresh
 * copy. Sessions are read before their registrations and customers last, so a
 * registration in the snapshot always has its session and customer.
 */
export class ReportingAggregator {
  constructor(private readonly store: EngagementStore) {}

  async engagementReport(start: Date | string, end: Date | string): Promise<EngagementReport> {
    const period = parseReportWindow(start, end);
    const window = { from: period.start, to: period.end };

    const sessions = await this.store.sessions.list(window);
    const sessionIds = sessions.map((session) => session.id);
    const [registrations, followUps] = await Promise.all([
      this.store.registrations.listBySessions(sessionIds),
      this.store.followUps.listBySessions(sessionIds),
    ]);
    const [customers, outreach] = await Promise.all([
      this.store.customers.list({ includeInactive: true }),
      this.store.outreach.list(window),
    ]);

    const attendees = registrations.filter((registration) => registration.attended);
    const segmentOf = new Map<CustomerId, CustomerSegment>(
      customers.map((customer) => [customer.id, customer.segment]),
    );

    const customersBySegment: Record<CustomerSegment, SegmentEngagement> = {
      enterprise: { registrations: 0, attended: 0, attendanceRate: 0 },
      business: { registrations: 0, attended: 0, attendanceRate: 0 },
      startup: { registrations: 0, attended: 0, attendanceRate: 0 },
    };
    for (const registration of registrations) {
      const segment = segmentOf.get(registration.customerId);
      if (!segment) continue;
      customersBySegment[segment].registrations += 1;
      if (registration.attended) {
        customersBySegment[segment].attended += 1;
      }
    }
    for (const stats of Object.values(customersBySegment)) {
      stats.attendanceRate = percentage(stats.attended, stats.registrations);
    }

    const sessionsByType: Record<SessionType, number> = { emergency: 0, regular: 0, executive: 0, power_user: 0 };
    for (const session of sessions) {
      sessionsByType[session.type] += 1;
    }

    const followUpActionStatus: Record<FollowUpStatus, number> = { pending: 0, in_progress: 0, completed: 0 };
    for (const action of followUps) {
      followUpActionStatus[action.status] += 1;
    }

    const scores = customers.map((customer) => customer.trustScore);

    return {
      period,
      totalSessions: sessions.length,
      totalRegistrations: registrations.length,
      totalAttendees: attendees.length,
      attendanceRate: percentage(attendees.length, registrations.length),
      averageRating: mean(submittedRatings(registrations)),
      customersBySegment,
      sessionsByType,
      trustScoreChanges: {
        improved: scores.filter((score) => score > TRUST_SCORE_DEFAULT).length,
        declined: scores.filter((score) => score < TRUST_SCORE_DEFAULT).length,
        average: mean(scores),
      },
      executiveOutreachCount: outreach.length,
      followUpActionStatus,
    };
  }

  async customerEngagement(customerId: CustomerId): Promise<CustomerEngagementSummary> {
    const customer = await this.store.customers.get(customerId);
    if (!customer) {
      throw notFound("Customer", customerId);
    }
    const [registrations, outreach] = await Promise.all([
      this.store.registrations.listByCustomer(customerId),
      this.store.outreach.listByCustomer(customerId),
    ]);
    const attended = registrations.filter((registration) => registration.attended).length;

    return {
      customer,
      totalRegistrations: registrations.length,
      totalAttended: attended,
      attendanceRate: percentage(attended, registrations.length),
      averageRating: mean(submittedRatings(registrations)),
      lastEngagementAt: customer.lastEngagementAt,
      currentTrustScore: customer.trustScore,
      outreachCount: outreach.length,
    };
  }
}
