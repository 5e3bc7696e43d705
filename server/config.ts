import { z } from "zod";
import type { EventBusConfig } from "./services/event-bus";
import type { NotificationSettings } from "./services/notification";

const flag = z
  .enum(["true", "false"])
  .default("false")
  .transform((value) => value === "true");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  DATABASE_URL: z.string().url().optional(),

  EVENT_BUS_DRIVER: z.enum(["memory", "kafka"]).default("memory"),
  KAFKA_BROKERS: z.string().default(""),
  EVENT_BUS_KAFKA_TOPIC: z.string().min(1).default("engagement.events"),
  EVENT_BUS_CLIENT_ID: z.string().min(1).default("engagement-scheduler"),
  EVENT_BUS_MAX_RETRIES: z.coerce.number().int().positive().default(3),
  EVENT_BUS_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(100),

  ENABLE_EMAIL_NOTIFICATIONS: flag,
  SMTP_HOST: z.string().min(1).optional(),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_SECURE: flag,
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  SMTP_FROM: z.string().optional(),

  ENABLE_SMS_NOTIFICATIONS: flag,
  SMS_PROVIDER: z.string().optional(),
  SMS_ACCOUNT_SID: z.string().optional(),
  SMS_AUTH_TOKEN: z.string().optional(),
  SMS_FROM_NUMBER: z.string().optional(),

  INVITE_MAX_RETRIES: z.coerce.number().int().positive().default(3),
  INVITE_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(200),
});

export interface AppConfig {
  env: "development" | "production" | "test";
  port: number;
  host: string;
  logLevel: string;
  databaseUrl: string | null;
  eventBus: EventBusConfig;
  notifications: NotificationSettings;
  invites: { maxRetries: number; retryDelayMs: number };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }
  const env = parsed.data;

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    databaseUrl: env.DATABASE_URL ?? null,
    eventBus: {
      driver: env.EVENT_BUS_DRIVER,
      kafkaBrokers: env.KAFKA_BROKERS.split(",")
        .map((entry) => entry.trim())
        .filter(Boolean),
      kafkaTopic: env.EVENT_BUS_KAFKA_TOPIC,
      clientId: env.EVENT_BUS_CLIENT_ID,
      maxRetries: env.EVENT_BUS_MAX_RETRIES,
      retryDelayMs: env.EVENT_BUS_RETRY_DELAY_MS,
    },
    notifications: {
      emailEnabled: env.ENABLE_EMAIL_NOTIFICATIONS,
      smsEnabled: env.ENABLE_SMS_NOTIFICATIONS,
      smsProvider: env.SMS_PROVIDER,
      smtp: env.SMTP_HOST
        ? {
            host: env.SMTP_HOST,
            port: env.SMTP_PORT,
            secure: env.SMTP_SECURE,
            user: env.SMTP_USER,
            pass: env.SMTP_PASS,
            from: env.SMTP_FROM,
          }
        : null,
      twilio: {
        accountSid: env.SMS_ACCOUNT_SID,
        authToken: env.SMS_AUTH_TOKEN,
        fromNumber: env.SMS_FROM_NUMBER,
      },
    },
    invites: {
      maxRetries: env.INVITE_MAX_RETRIES,
      retryDelayMs: env.INVITE_RETRY_DELAY_MS,
    },
  };
}
