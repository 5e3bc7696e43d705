import test from "node:test";
import assert from "node:assert/strict";
import { addWeeks, set } from "date-fns";

import { buildPostIncidentProgram, schedulePostIncidentProgram } from "./services/program";
import { addCustomer, createTestHarness } from "./test-support";

const start = new Date(2026, 3, 6, 8, 0, 0, 0);

test("the post-incident plan has 28 emergency, 12 power user and 6 executive sessions", () => {
  const plan = buildPostIncidentProgram(start);

  assert.equal(plan.length, 46);
  assert.equal(plan.filter((planned) => planned.type === "emergency").length, 28);
  assert.equal(plan.filter((planned) => planned.type === "power_user").length, 12);
  assert.equal(plan.filter((planned) => planned.type === "executive").length, 6);
});

test("the plan is ordered by time", () => {
  const times = buildPostIncidentProgram(start).map((planned) => planned.scheduledAt.getTime());
  assert.deepEqual(
    times,
    [...times].sort((a, b) => a - b),
  );
});

test("emergency sessions run at 10:00 and 17:00 for thirty minutes", () => {
  const [morning, evening] = buildPostIncidentProgram(start);

  assert.equal(morning?.type, "emergency");
  assert.equal(morning?.scheduledAt.getHours(), 10);
  assert.equal(morning?.durationMinutes, 30);
  assert.equal(morning?.capacity, 50);
  assert.equal(evening?.scheduledAt.getHours(), 17);
});

test("ongoing sessions start two weeks in", () => {
  const plan = buildPostIncidentProgram(start);
  const firstPowerUser = plan.find((planned) => planned.type === "power_user");
  const executive = plan.filter((planned) => planned.type === "executive");
  const ongoingStart = addWeeks(start, 2);

  assert.equal(
    firstPowerUser?.scheduledAt.getTime(),
    set(ongoingStart, { hours: 14, minutes: 0, seconds: 0, milliseconds: 0 }).getTime(),
  );
  assert.equal(firstPowerUser?.capacity, 25);
  assert.equal(firstPowerUser?.durationMinutes, 60);
  assert.equal(
    executive[1]?.scheduledAt.getTime(),
    set(addWeeks(ongoingStart, 4), { hours: 16, minutes: 0, seconds: 0, milliseconds: 0 }).getTime(),
  );
  assert.equal(executive[0]?.capacity, 15);
  assert.equal(executive[0]?.durationMinutes, 45);
});

test("scheduling skips slots that already passed and invites eligible customers", async () => {
  const noon = set(start, { hours: 12 });
  const harness = createTestHarness(noon);
  await addCustomer(harness.store, { id: "acme", segment: "enterprise", contractValue: 250_000 });

  const sessions = await schedulePostIncidentProgram(harness.catalog, start, noon);

  assert.equal(sessions.length, 45);
  assert.equal((await harness.catalog.list()).length, 45);
  assert.ok(sessions.every((session) => session.scheduledAt.getTime() >= noon.getTime()));
  assert.equal(harness.dispatcher.notices.length, 27 + 6);
});
