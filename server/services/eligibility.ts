import { subDays } from "date-fns";
import type { Customer, SessionType } from "@shared/schema";

export type EligibilityPredicate = (customer: Customer, now: Date) => boolean;

export const EXECUTIVE_CONTRACT_THRESHOLD = 100_000;
export const POWER_USER_ACTIVITY_DAYS = 30;

export const sessionEligibilityPolicies: Readonly<Record<SessionType, EligibilityPredicate>> = {
  emergency: (customer) => customer.incidentImpact === "high" || customer.segment === "enterprise",
  executive: (customer) =>
    customer.segment === "enterprise" && customer.contractValue > EXECUTIVE_CONTRACT_THRESHOLD,
  power_user: (customer, now) =>
    customer.lastEngagementAt !== null &&
    customer.lastEngagementAt.getTime() > subDays(now, POWER_USER_ACTIVITY_DAYS).getTime(),
  regular: () => true,
};

export function isEligibleForSession(
  type: SessionType,
  customer: Customer,
  now: Date,
  policies: Readonly<Record<SessionType, EligibilityPredicate>> = sessionEligibilityPolicies,
): boolean {
  return customer.isActive && policies[type](customer, now);
}

export function selectInvitees(
  type: SessionType,
  customers: readonly Customer[],
  now: Date,
  policies?: Readonly<Record<SessionType, EligibilityPredicate>>,
): Customer[] {
  return customers.filter((customer) => isEligibleForSession(type, customer, now, policies));
}

/** Only the highest-value segment qualifies for executive outreach. */
export function isEligibleForExecutiveOutreach(customer: Customer): boolean {
  return customer.segment === "enterprise";
}
