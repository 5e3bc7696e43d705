import test from "node:test";
import assert from "node:assert/strict";

import type { EngagementEvent } from "@shared/events";
import { customerIdSchema } from "@shared/schema";
import { isEngagementError } from "./services/errors";
import {
  TRUST_SCORE_MAX,
  TRUST_SCORE_MIN,
  applySignals,
  clampTrustScore,
  ratingAdjustment,
  type TrustSignal,
} from "./services/trust-score";
import { addCustomer, createTestHarness } from "./test-support";

test("clampTrustScore bounds the score and rounds to two decimals", () => {
  assert.equal(clampTrustScore(0), 1);
  assert.equal(clampTrustScore(-4), 1);
  assert.equal(clampTrustScore(12), 10);
  assert.equal(clampTrustScore(6.456), 6.46);
  assert.equal(clampTrustScore(7), 7);
});

test("ratings move the score half a point per step from the midpoint", () => {
  assert.equal(ratingAdjustment(5), 1);
  assert.equal(ratingAdjustment(4), 0.5);
  assert.equal(ratingAdjustment(3), 0);
  assert.equal(ratingAdjustment(1), -1);
});

test("ratings outside 1-5 or non-integer are rejected", () => {
  for (const rating of [0, 6, 4.5, Number.NaN]) {
    assert.throws(() => ratingAdjustment(rating), (error) => isEngagementError(error, "INVALID_INPUT"));
  }
});

test("applySignals folds feedback then outreach: 5 -> 6 -> 8", () => {
  const signals: TrustSignal[] = [
    { source: "feedback", rating: 5 },
    { source: "outreach", delta: 2 },
  ];
  assert.equal(applySignals(5, signals), 8);
});

test("applySignals clamps after every signal", () => {
  assert.equal(
    applySignals(9.5, [
      { source: "outreach", delta: 9 },
      { source: "feedback", rating: 1 },
    ]),
    9,
  );
  assert.equal(applySignals(1.2, [{ source: "outreach", delta: -9 }]), 1);
});

test("outreach deltas beyond the score range are rejected", () => {
  assert.throws(
    () => applySignals(5, [{ source: "outreach", delta: 9.5 }]),
    (error) => isEngagementError(error, "INVALID_INPUT"),
  );
  assert.throws(
    () => applySignals(5, [{ source: "outreach", delta: Number.POSITIVE_INFINITY }]),
    (error) => isEngagementError(error, "INVALID_INPUT"),
  );
});

test("score stays in bounds for long mixed signal sequences", () => {
  let seed = 7;
  const next = () => {
    seed = (seed * 48271) % 2147483647;
    return seed / 2147483647;
  };
  let score = 5;
  for (let i = 0; i < 500; i++) {
    const signal: TrustSignal =
      next() < 0.5
        ? { source: "feedback", rating: 1 + Math.floor(next() * 5) }
        : { source: "outreach", delta: Math.round((next() * 18 - 9) * 100) / 100 };
    score = applySignals(score, [signal]);
    assert.ok(score >= TRUST_SCORE_MIN && score <= TRUST_SCORE_MAX, `score ${score} out of bounds`);
  }
});

test("TrustScoreEngine persists the new score and engagement time", async () => {
  const harness = createTestHarness();
  const customer = await addCustomer(harness.store, { id: "cust-1" });

  assert.equal(customer.trustScore, 5);
  assert.equal(await harness.trust.apply(customer.id, { source: "feedback", rating: 5 }), 6);
  assert.equal(await harness.trust.apply(customer.id, { source: "outreach", delta: 2 }), 8);

  const stored = await harness.store.customers.get(customer.id);
  assert.equal(stored?.trustScore, 8);
  assert.equal(stored?.lastEngagementAt?.toISOString(), harness.clock.now().toISOString());
});

test("TrustScoreEngine leaves the record untouched when any signal is invalid", async () => {
  const harness = createTestHarness();
  const customer = await addCustomer(harness.store, { id: "cust-1" });

  await assert.rejects(
    harness.trust.apply(customer.id, { source: "feedback", rating: 5 }, { source: "outreach", delta: 20 }),
    (error) => isEngagementError(error, "INVALID_INPUT"),
  );

  const stored = await harness.store.customers.get(customer.id);
  assert.equal(stored?.trustScore, 5);
  assert.equal(stored?.lastEngagementAt, null);
});

test("TrustScoreEngine rejects unknown customers", async () => {
  const harness = createTestHarness();
  await assert.rejects(
    harness.trust.apply(customerIdSchema.parse("ghost"), { source: "outreach", delta: 1 }),
    (error) => isEngagementError(error, "NOT_FOUND"),
  );
});

test("concurrent updates for one customer are all applied", async () => {
  const harness = createTestHarness();
  const customer = await addCustomer(harness.store, { id: "cust-1" });

  await Promise.all(
    Array.from({ length: 8 }, () => harness.trust.apply(customer.id, { source: "outreach", delta: 0.5 })),
  );

  const stored = await harness.store.customers.get(customer.id);
  assert.equal(stored?.trustScore, 9);
});

test("TrustScoreEngine publishes a score change event", async () => {
  const harness = createTestHarness();
  const customer = await addCustomer(harness.store, { id: "cust-1" });
  const received: EngagementEvent[] = [];
  harness.events.on((event) => {
    received.push(event);
  });

  await harness.trust.apply(customer.id, { source: "feedback", rating: 4 });
  await new Promise((resolve) => setImmediate(resolve));

  assert.equal(received.length, 1);
  const [event] = received;
  assert.equal(event?.category, "engagement.trust");
  assert.deepEqual(event?.payload, {
    customerId: "cust-1",
    previousScore: 5,
    score: 5.5,
    signals: ["feedback"],
  });
});
