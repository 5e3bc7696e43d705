import { format } from "date-fns";
import type { Customer, Session, SessionType } from "@shared/schema";
import type { NotificationService } from "./notification";
import defaultLogger, { type ServiceLogger } from "../logger";

export type InviteKind = "invitation" | "confirmation";

export interface InviteNotice {
  kind: InviteKind;
  session: Session;
  customer: Customer;
  /** Overrides the customer's primary contact address. */
  email?: string;
}

/** Hands notices to delivery without waiting for it. */
export interface InviteDispatcher {
  dispatch(notice: InviteNotice): void;
}

export interface InviteMessage {
  to: string;
  subject: string;
  html: string;
  sms: string;
}

export const sessionTypeLabels: Record<SessionType, string> = {
  emergency: "Emergency Office Hours",
  regular: "Office Hours",
  executive: "Executive Office Hours",
  power_user: "Power User Office Hours",
};

const htmlEntities: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => htmlEntities[char] ?? char);
}

export function renderInvite(notice: InviteNotice): InviteMessage {
  const { session, customer } = notice;
  const label = sessionTypeLabels[session.type];
  const when = format(session.scheduledAt, "yyyy-MM-dd HH:mm");
  const subject =
    notice.kind === "invitation" ? `You're invited: ${label}` : `Registration confirmed: ${label}`;
  const agenda = session.agenda.length
    ? `<ul>${session.agenda.map((item) => `<li>${escapeHtml(item)}</li>`).join("")}</ul>`
    : "";
  const html = [
    `<p>Hi ${escapeHtml(customer.primaryContact.name)},</p>`,
    `<p>${escapeHtml(session.description || label)} on ${when} (${session.durationMinutes} minutes).</p>`,
    agenda,
  ].join("");
  return {
    to: notice.email ?? customer.primaryContact.email,
    subject,
    html,
    sms: `${subject} on ${when}`,
  };
}

interface QueuedInviteDispatcherOptions {
  notifications: NotificationService;
  maxRetries?: number;
  retryDelayMs?: number;
  logger?: ServiceLogger;
}

export type InviteChannel = "email" | "sms";

export interface DeliveryFailure {
  notice: InviteNotice;
  channel: InviteChannel;
  error: string;
}

/**
 * In-process delivery queue. Notices are sent one at a time; each channel is
 * retried on its own with exponential backoff, so a channel that already
 * succeeded is not sent again. A channel that exhausts its retries is logged
 * and kept in `failures`.
 */
export class QueuedInviteDispatcher implements InviteDispatcher {
  private readonly queue: InviteNotice[] = [];
  private readonly logger: ServiceLogger;
  private draining?: Promise<void>;
  readonly failures: DeliveryFailure[] = [];
  delivered = 0;

  constructor(private readonly options: QueuedInviteDispatcherOptions) {
    this.logger = options.logger ?? defaultLogger;
  }

  dispatch(notice: InviteNotice): void {
    this.queue.push(notice);
    this.kick();
  }

  get pending(): number {
    return this.queue.length;
  }

  /** Resolves once every queued notice has been attempted. */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  private kick(): void {
    if (this.draining) return;
    this.draining = this.drain()
      .catch((error: unknown) => {
        this.logger.error({ err: error }, "Invite queue stopped unexpectedly");
      })
      .finally(() => {
        this.draining = undefined;
        if (this.queue.length) {
          this.kick();
        }
      });
  }

  private async drain(): Promise<void> {
    let notice = this.queue.shift();
    while (notice) {
      await this.deliver(notice);
      notice = this.queue.shift();
    }
  }

  private async deliver(notice: InviteNotice): Promise<void> {
    const message = renderInvite(notice);
    const phone = notice.customer.primaryContact.phone;

    let sent = await this.attempt(notice, "email", () =>
      this.options.notifications.sendEmail(message.to, message.subject, message.html),
    );
    if (phone) {
      const texted = await this.attempt(notice, "sms", () => this.options.notifications.sendSMS(phone, message.sms));
      sent = sent && texted;
    }
    if (sent) {
      this.delivered += 1;
    }
  }

  private async attempt(
    notice: InviteNotice,
    channel: InviteChannel,
    send: () => Promise<boolean>,
  ): Promise<boolean> {
    const attempts = Math.max(1, this.options.maxRetries ?? 3);
    const baseDelay = Math.max(0, this.options.retryDelayMs ?? 200);

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await send();
        return true;
      } catch (error) {
        if (attempt === attempts) {
          this.failures.push({
            notice,
            channel,
            error: error instanceof Error ? error.message : String(error),
          });
          this.logger.error(
            { err: error, channel, sessionId: notice.session.id, customerId: notice.customer.id, attempts },
            "Failed to deliver session invite",
          );
          return false;
        }
        const delay = baseDelay * Math.pow(2, attempt - 1);
        this.logger.warn(
          { err: error, channel, attempt, sessionId: notice.session.id },
          "Invite delivery failed, retrying",
        );
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
    return false;
  }
}
