import test from "node:test";
import assert from "node:assert/strict";
import { subDays } from "date-fns";

import { customerIdSchema, type Customer } from "@shared/schema";
import {
  isEligibleForExecutiveOutreach,
  isEligibleForSession,
  selectInvitees,
} from "./services/eligibility";

const now = new Date("2026-03-02T09:00:00.000Z");

function makeCustomer(id: string, overrides: Partial<Omit<Customer, "id">> = {}): Customer {
  return {
    id: customerIdSchema.parse(id),
    name: `Customer ${id}`,
    segment: "business",
    contractValue: 50_000,
    incidentImpact: "medium",
    primaryContact: { name: "Sam Ops", email: `${id}@example.com`, role: "Ops", timezone: "UTC" },
    successManager: "csm@example.com",
    lastEngagementAt: null,
    trustScore: 5,
    isActive: true,
    createdAt: now,
    ...overrides,
  };
}

test("emergency sessions go to high-impact or enterprise customers", () => {
  assert.equal(isEligibleForSession("emergency", makeCustomer("a", { segment: "startup", incidentImpact: "high" }), now), true);
  assert.equal(isEligibleForSession("emergency", makeCustomer("b", { segment: "enterprise", incidentImpact: "low" }), now), true);
  assert.equal(isEligibleForSession("emergency", makeCustomer("c"), now), false);
});

test("executive sessions need an enterprise contract above the threshold", () => {
  assert.equal(
    isEligibleForSession("executive", makeCustomer("a", { segment: "enterprise", contractValue: 150_000 }), now),
    true,
  );
  assert.equal(
    isEligibleForSession("executive", makeCustomer("b", { segment: "enterprise", contractValue: 100_000 }), now),
    false,
  );
  assert.equal(
    isEligibleForSession("executive", makeCustomer("c", { segment: "business", contractValue: 500_000 }), now),
    false,
  );
});

test("power user sessions go to customers engaged in the last 30 days", () => {
  assert.equal(isEligibleForSession("power_user", makeCustomer("a", { lastEngagementAt: subDays(now, 10) }), now), true);
  assert.equal(isEligibleForSession("power_user", makeCustomer("b", { lastEngagementAt: subDays(now, 31) }), now), false);
  assert.equal(isEligibleForSession("power_user", makeCustomer("c"), now), false);
});

test("regular sessions go to every active customer", () => {
  assert.equal(isEligibleForSession("regular", makeCustomer("a"), now), true);
  assert.equal(isEligibleForSession("regular", makeCustomer("b", { isActive: false }), now), false);
});

test("selectInvitees keeps only eligible customers", () => {
  const customers = [
    makeCustomer("ent", { segment: "enterprise" }),
    makeCustomer("hot", { incidentImpact: "high" }),
    makeCustomer("calm", { incidentImpact: "low" }),
    makeCustomer("gone", { segment: "enterprise", isActive: false }),
  ];

  assert.deepEqual(
    selectInvitees("emergency", customers, now).map((customer) => customer.id),
    ["ent", "hot"],
  );
});

test("executive outreach is limited to enterprise customers", () => {
  assert.equal(isEligibleForExecutiveOutreach(makeCustomer("a", { segment: "enterprise" })), true);
  assert.equal(isEligibleForExecutiveOutreach(makeCustomer("b", { segment: "business" })), false);
  assert.equal(isEligibleForExecutiveOutreach(makeCustomer("c", { segment: "startup" })), false);
});
