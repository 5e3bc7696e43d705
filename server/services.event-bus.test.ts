import test from "node:test";
import assert from "node:assert/strict";
import type { ProducerRecord } from "kafkajs";

import {
  EventBus,
  createEngagementEvent,
  createEventBus,
  type KafkaProducer,
} from "./services/event-bus";
import { FixedClock } from "./services/clock";
import { TEST_NOW, createRecordingLogger, createTestHarness } from "./test-support";

const baseEvent = createEngagementEvent({
  source: "test-suite",
  category: "engagement.session",
  name: "scheduled",
  payload: {
    sessionId: "session-1",
    type: "emergency",
    scheduledAt: "2026-03-03T10:00:00.000Z",
    capacity: 50,
    invited: 3,
  },
});

test("createEngagementEvent fills in the envelope", () => {
  assert.equal(baseEvent.source, "test-suite");
  assert.equal(baseEvent.schemaVersion, "1.0");
  assert.match(baseEvent.eventId, /^[0-9a-f-]{36}$/);
  assert.ok(!Number.isNaN(Date.parse(baseEvent.occurredAt)));

  const defaulted = createEngagementEvent({
    category: "engagement.trust",
    name: "score_changed",
    payload: { customerId: "cust-1", previousScore: 5, score: 6, signals: ["feedback"] },
  });
  assert.equal(defaulted.source, "engagement-scheduler");
});

test("createEngagementEvent rejects payloads with unknown fields", () => {
  const payload = { outreachId: "o-1", customerId: "cust-1", executiveName: "Dana Reyes", extra: true };
  assert.throws(() => createEngagementEvent({ category: "engagement.outreach", name: "scheduled", payload }));
});

test("emitted events are stamped by the bus clock", async () => {
  const bus = new EventBus({ driver: "memory", clock: new FixedClock(TEST_NOW) });
  const stamps: string[] = [];
  bus.on((event) => {
    stamps.push(event.occurredAt);
  });

  bus.emit({
    category: "engagement.trust",
    name: "score_changed",
    payload: { customerId: "cust-1", previousScore: 5, score: 6, signals: ["feedback"] },
  });
  await new Promise((resolve) => setImmediate(resolve));

  assert.deepEqual(stamps, [TEST_NOW.toISOString()]);
});

test("service events carry the injected clock time", async () => {
  const harness = createTestHarness();
  const stamps: string[] = [];
  harness.events.on((event) => {
    stamps.push(event.occurredAt);
  });

  await harness.catalog.schedule({
    type: "regular",
    scheduledAt: new Date(TEST_NOW.getTime() + 60 * 60 * 1000),
    durationMinutes: 30,
    capacity: 5,
  });
  await new Promise((resolve) => setImmediate(resolve));

  assert.deepEqual(stamps, [TEST_NOW.toISOString()]);
});

test("memory event bus notifies listeners", async () => {
  const received: string[] = [];
  const bus = new EventBus({ driver: "memory" });
  bus.on((event) => {
    received.push(event.eventId);
  });

  await bus.publish(baseEvent);

  assert.deepEqual(received, [baseEvent.eventId]);
});

test("a failing listener is logged and does not fail the publish", async () => {
  const { logger, lines } = createRecordingLogger();
  const bus = new EventBus({ driver: "memory", logger });
  const received: string[] = [];
  bus.on(() => {
    throw new Error("listener broke");
  });
  bus.on((event) => {
    received.push(event.name);
  });

  await bus.publish(baseEvent);

  assert.deepEqual(received, ["scheduled"]);
  assert.deepEqual(lines, [{ level: "warn", msg: "Event listener failed" }]);
});

test("emit logs malformed events instead of throwing", () => {
  const { logger, lines } = createRecordingLogger();
  const bus = new EventBus({ driver: "memory", logger });

  bus.emit({
    category: "engagement.session",
    name: "scheduled",
    payload: { sessionId: "", type: "regular", scheduledAt: "2026-03-03T10:00:00.000Z", capacity: 10 },
  });

  assert.deepEqual(lines, [{ level: "error", msg: "Rejected malformed engagement event" }]);
});

test("kafka event bus retries publish failures", async () => {
  let attempts = 0;
  const sent: ProducerRecord[] = [];
  const producer: KafkaProducer = {
    async connect() {
      return undefined;
    },
    async disconnect() {
      return undefined;
    },
    async send(record) {
      attempts += 1;
      if (attempts < 2) {
        throw new Error("temporary failure");
      }
      sent.push(record);
      return [];
    },
  };

  const bus = new EventBus({
    driver: "kafka",
    kafka: {
      brokers: ["example:9092"],
      topic: "engagement.events",
      producer,
    },
    maxRetries: 3,
    retryBackoffMs: 10,
    logger: createRecordingLogger().logger,
  });

  await bus.publish(baseEvent);

  assert.equal(attempts, 2);
  assert.equal(sent.length, 1);
  assert.equal(sent[0]?.topic, "engagement.events");
  const [message] = sent[0]?.messages ?? [];
  assert.equal(message?.key, baseEvent.eventId);
  assert.equal(JSON.parse(String(message?.value)).eventId, baseEvent.eventId);
});

test("kafka event bus gives up after the configured attempts", async () => {
  let attempts = 0;
  const producer: KafkaProducer = {
    async connect() {
      return undefined;
    },
    async disconnect() {
      return undefined;
    },
    async send() {
      attempts += 1;
      throw new Error("broker down");
    },
  };
  const bus = new EventBus({
    driver: "kafka",
    kafka: { brokers: ["example:9092"], topic: "engagement.events", producer },
    maxRetries: 2,
    retryBackoffMs: 1,
    logger: createRecordingLogger().logger,
  });

  await assert.rejects(bus.publish(baseEvent), /broker down/);
  assert.equal(attempts, 2);
});

test("createEventBus needs brokers for the kafka driver", () => {
  const config = {
    kafkaBrokers: [],
    kafkaTopic: "engagement.events",
    clientId: "engagement-scheduler",
    maxRetries: 3,
    retryDelayMs: 100,
  };

  assert.throws(() => createEventBus({ ...config, driver: "kafka" }), /KAFKA_BROKERS must be set/);
  assert.equal(createEventBus({ ...config, driver: "memory" }).driver, "memory");
});
