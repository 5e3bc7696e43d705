import test from "node:test";
import assert from "node:assert/strict";

import { customerIdSchema, outreachIdSchema } from "@shared/schema";
import { isEngagementError } from "./services/errors";
import { DAY_MS, TEST_NOW, addCustomer, createTestHarness, sessionInput } from "./test-support";

test("outreach defaults to three days out and awaits completion", async () => {
  const harness = createTestHarness();
  const customer = await addCustomer(harness.store, { id: "acme", segment: "enterprise" });

  const outreach = await harness.outreach.schedule(customer.id, "  Dana Reyes ", "CTO");

  assert.equal(outreach.executiveName, "Dana Reyes");
  assert.equal(outreach.executiveRole, "CTO");
  assert.equal(outreach.scheduledFor.toISOString(), new Date(TEST_NOW.getTime() + 3 * DAY_MS).toISOString());
  assert.equal(outreach.completedAt, null);
  assert.equal(outreach.followUpRequired, true);
  assert.deepEqual(
    (await harness.outreach.listForCustomer(customer.id)).map((entry) => entry.id),
    [outreach.id],
  );
});

test("outreach keeps an explicit time", async () => {
  const harness = createTestHarness();
  const customer = await addCustomer(harness.store, { id: "acme" });
  const when = new Date("2026-03-20T15:00:00.000Z");

  const outreach = await harness.outreach.schedule(customer.id, "Dana Reyes", "CTO", when);

  assert.equal(outreach.scheduledFor.toISOString(), "2026-03-20T15:00:00.000Z");
});

test("outreach for a non-enterprise customer always fails", async () => {
  const harness = createTestHarness();
  for (const segment of ["business", "startup"] as const) {
    const customer = await addCustomer(harness.store, { id: `cust-${segment}`, segment });
    await assert.rejects(
      harness.outreach.schedule(customer.id, "Dana Reyes", "CTO"),
      (error) => isEngagementError(error, "INVALID_SEGMENT"),
    );
    assert.deepEqual(await harness.outreach.listForCustomer(customer.id), []);
  }
});

test("outreach needs a name, a role and a known customer", async () => {
  const harness = createTestHarness();
  const customer = await addCustomer(harness.store, { id: "acme" });

  await assert.rejects(
    harness.outreach.schedule(customer.id, "   ", "CTO"),
    (error) => isEngagementError(error, "INVALID_INPUT"),
  );
  await assert.rejects(
    harness.outreach.schedule(customer.id, "Dana Reyes", ""),
    (error) => isEngagementError(error, "INVALID_INPUT"),
  );
  await assert.rejects(
    harness.outreach.schedule(customerIdSchema.parse("ghost"), "Dana Reyes", "CTO"),
    (error) => isEngagementError(error, "NOT_FOUND"),
  );
});

test("completing outreach records the outcome and applies the delta", async () => {
  const harness = createTestHarness();
  const customer = await addCustomer(harness.store, { id: "acme" });
  const outreach = await harness.outreach.schedule(customer.id, "Dana Reyes", "CTO");
  harness.clock.advance(3 * DAY_MS);

  const result = await harness.outreach.complete(outreach.id, " Agreed on a quarterly review ", 2, 45);

  assert.equal(result.trustScore, 7);
  assert.equal(result.outreach.outcome, "Agreed on a quarterly review");
  assert.equal(result.outreach.trustDelta, 2);
  assert.equal(result.outreach.durationMinutes, 45);
  assert.equal(result.outreach.completedAt?.toISOString(), new Date(TEST_NOW.getTime() + 3 * DAY_MS).toISOString());
});

test("outreach completes only once", async () => {
  const harness = createTestHarness();
  const customer = await addCustomer(harness.store, { id: "acme" });
  const outreach = await harness.outreach.schedule(customer.id, "Dana Reyes", "CTO");

  const results = await Promise.allSettled([
    harness.outreach.complete(outreach.id, "Renewal secured", 2),
    harness.outreach.complete(outreach.id, "Renewal secured", 2),
  ]);

  assert.equal(results.filter((result) => result.status === "fulfilled").length, 1);
  const rejected = results.flatMap((result) => (result.status === "rejected" ? [result.reason] : []));
  assert.ok(isEngagementError(rejected[0], "ALREADY_COMPLETED"));
  assert.equal((await harness.store.customers.get(customer.id))?.trustScore, 7);
});

test("an out-of-range delta leaves the outreach open", async () => {
  const harness = createTestHarness();
  const customer = await addCustomer(harness.store, { id: "acme" });
  const outreach = await harness.outreach.schedule(customer.id, "Dana Reyes", "CTO");

  await assert.rejects(
    harness.outreach.complete(outreach.id, "Escalated", 12),
    (error) => isEngagementError(error, "INVALID_INPUT"),
  );
  await assert.rejects(
    harness.outreach.complete(outreach.id, "", 1),
    (error) => isEngagementError(error, "INVALID_INPUT"),
  );
  assert.equal((await harness.store.outreach.get(outreach.id))?.completedAt, null);
});

test("completing unknown outreach is not found", async () => {
  const harness = createTestHarness();
  await assert.rejects(
    harness.outreach.complete(outreachIdSchema.parse("missing"), "Done", 1),
    (error) => isEngagementError(error, "NOT_FOUND"),
  );
});

test("a top rating then a +2 outreach takes the default score to 8", async () => {
  const harness = createTestHarness();
  const customer = await addCustomer(harness.store, { id: "acme" });
  const session = await harness.catalog.schedule(sessionInput());
  await harness.ledger.register(session.id, customer.id);

  const attendance = await harness.ledger.recordAttendance(session.id, customer.id, true, {
    rating: 5,
    helpfulnessScore: 10,
  });
  assert.equal(attendance.trustScore, 6);

  const outreach = await harness.outreach.schedule(customer.id, "Dana Reyes", "CTO");
  const completion = await harness.outreach.complete(outreach.id, "Roadmap walkthrough", 2);
  assert.equal(completion.trustScore, 8);
});
