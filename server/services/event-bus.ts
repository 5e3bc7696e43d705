import { randomUUID } from "node:crypto";
import { Kafka, type Producer } from "kafkajs";
import { engagementEventSchema, type EngagementEvent } from "@shared/events";
import defaultLogger, { type ServiceLogger } from "../logger";
import { systemClock, type Clock } from "./clock";

type EventBusDriver = "memory" | "kafka";

export type KafkaProducer = Pick<Producer, "connect" | "disconnect" | "send">;

export interface KafkaBusOptions {
  brokers: string[];
  topic: string;
  clientId?: string;
  producer?: KafkaProducer;
}

interface BaseBusOptions {
  maxRetries?: number;
  retryBackoffMs?: number;
  logger?: ServiceLogger;
  /** Stamps `occurredAt` on emitted events. */
  clock?: Clock;
}

export type EventBusOptions =
  | (BaseBusOptions & { driver: "memory" })
  | (BaseBusOptions & { driver: "kafka"; kafka: KafkaBusOptions });

type EventListener = (event: EngagementEvent) => void | Promise<void>;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type EngagementEventDraft = DistributiveOmit<EngagementEvent, "eventId" | "occurredAt" | "schemaVersion" | "source"> & {
  eventId?: string;
  occurredAt?: string;
  schemaVersion?: string;
  source?: string;
};

export class EventBus {
  private readonly logger: ServiceLogger;
  private readonly clock: Clock;
  private readonly listeners = new Set<EventListener>();
  private kafkaProducer?: KafkaProducer;

  constructor(private readonly options: EventBusOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.clock = options.clock ?? systemClock;
  }

  get driver(): EventBusDriver {
    return this.options.driver;
  }

  on(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  async publish(event: EngagementEvent): Promise<void> {
    const payload = engagementEventSchema.parse(event);

    if (this.options.driver === "kafka") {
      const kafka = this.options.kafka;
      const serialized = JSON.stringify(payload);
      await this.withRetry(async () => {
        const producer = await this.ensureKafkaProducer(kafka);
        await producer.send({
          topic: kafka.topic,
          messages: [{ key: payload.eventId, value: serialized }],
        });
      });
    }

    await this.notifyListeners(payload);
  }

  /** Publishes without blocking the caller; failures are logged. */
  emit(draft: EngagementEventDraft): void {
    let event: EngagementEvent;
    try {
      event = createEngagementEvent(draft, this.clock);
    } catch (error) {
      this.logger.error({ err: error, category: draft.category }, "Rejected malformed engagement event");
      return;
    }
    this.publish(event).catch((error: unknown) => {
      this.logger.error({ err: error, eventId: event.eventId }, "Failed to publish engagement event");
    });
  }

  async shutdown(): Promise<void> {
    const ownsProducer = this.options.driver === "kafka" && !this.options.kafka.producer;
    if (this.kafkaProducer && ownsProducer) {
      try {
        await this.kafkaProducer.disconnect();
      } catch (error) {
        this.logger.warn({ err: error }, "Failed to disconnect Kafka producer");
      }
    }
    this.listeners.clear();
  }

  private async ensureKafkaProducer(config: KafkaBusOptions): Promise<KafkaProducer> {
    if (this.kafkaProducer) {
      return this.kafkaProducer;
    }
    if (config.producer) {
      this.kafkaProducer = config.producer;
      return this.kafkaProducer;
    }
    const kafka = new Kafka({
      clientId: config.clientId ?? "engagement-scheduler",
      brokers: config.brokers,
    });
    const producer = kafka.producer();
    await producer.connect();
    this.kafkaProducer = producer;
    return producer;
  }

  private async notifyListeners(event: EngagementEvent): Promise<void> {
    const listeners = Array.from(this.listeners);
    if (!listeners.length) return;
    await Promise.all(
      listeners.map(async (listener) => {
        try {
          await listener(event);
        } catch (error) {
          this.logger.warn({ err: error, eventId: event.eventId }, "Event listener failed");
        }
      }),
    );
  }

  private async withRetry(operation: () => Promise<void>): Promise<void> {
    const attempts = Math.max(1, this.options.maxRetries ?? 3);
    const baseDelay = Math.max(1, this.options.retryBackoffMs ?? 100);
    let lastError: unknown;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await operation();
        return;
      } catch (error) {
        lastError = error;
        if (attempt === attempts) {
          break;
        }
        const delay = baseDelay * Math.pow(2, attempt - 1);
        this.logger.warn({ err: error, attempt }, "Event publish failed, retrying");
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
    throw lastError instanceof Error ? lastError : new Error("Failed to publish event");
  }
}

export interface EventBusConfig {
  driver: EventBusDriver;
  kafkaBrokers: string[];
  kafkaTopic: string;
  clientId: string;
  maxRetries: number;
  retryDelayMs: number;
}

export function createEventBus(config: EventBusConfig, logger?: ServiceLogger, clock?: Clock): EventBus {
  if (config.driver === "kafka") {
    if (!config.kafkaBrokers.length) {
      throw new Error("KAFKA_BROKERS must be set when EVENT_BUS_DRIVER=kafka");
    }
    return new EventBus({
      driver: "kafka",
      kafka: {
        brokers: config.kafkaBrokers,
        topic: config.kafkaTopic,
        clientId: config.clientId,
      },
      logger,
      clock,
      maxRetries: config.maxRetries,
      retryBackoffMs: config.retryDelayMs,
    });
  }
  return new EventBus({ driver: "memory", logger, clock });
}

export function createEngagementEvent(draft: EngagementEventDraft, clock: Clock = systemClock): EngagementEvent {
  return engagementEventSchema.parse({
    ...draft,
    eventId: draft.eventId ?? randomUUID(),
    occurredAt: draft.occurredAt ?? clock.now().toISOString(),
    schemaVersion: draft.schemaVersion ?? "1.0",
    source: draft.source ?? "engagement-scheduler",
  });
}
