import nodemailer from 'nodemailer';
import twilio from 'twilio';
import defaultLogger, { type ServiceLogger } from '../logger';

export type SMSClient = {
  send: (to: string, body: string) => Promise<void>;
};

export type EmailClient = {
  send: (message: { from: string; to: string; subject: string; html: string }) => Promise<void>;
};

export interface SmtpSettings {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  pass?: string;
  from?: string;
}

export interface TwilioSettings {
  accountSid?: string;
  authToken?: string;
  fromNumber?: string;
}

export interface NotificationSettings {
  emailEnabled: boolean;
  smsEnabled: boolean;
  smsProvider?: string;
  smtp?: SmtpSettings | null;
  twilio?: TwilioSettings;
}

type NotificationServiceOptions = {
  settings?: NotificationSettings;
  smsClient?: SMSClient | null;
  emailClient?: EmailClient | null;
  logger?: ServiceLogger & { debug?: (msg: string) => void };
};

const disabledSettings: NotificationSettings = { emailEnabled: false, smsEnabled: false };

function createTwilioClient(settings: TwilioSettings = {}): SMSClient {
  const { accountSid, authToken, fromNumber } = settings;

  if (!accountSid || !authToken || !fromNumber) {
    throw new Error('Twilio SMS provider is not fully configured');
  }

  const client = twilio(accountSid, authToken);

  return {
    async send(to: string, body: string) {
      await client.messages.create({
        to,
        from: fromNumber,
        body,
      });
    },
  };
}

function resolveSMSClient(settings: NotificationSettings): SMSClient | null {
  const provider = settings.smsProvider?.toLowerCase();
  if (!provider) {
    return null;
  }

  if (provider !== 'twilio') {
    throw new Error(`Unsupported SMS provider: ${provider}`);
  }

  return createTwilioClient(settings.twilio);
}

function createSmtpClient(smtp: SmtpSettings): EmailClient {
  const transporter = nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.secure,
    auth: smtp.user
      ? {
          user: smtp.user,
          pass: smtp.pass,
        }
      : undefined,
  });

  return {
    async send(message) {
      await transporter.sendMail(message);
    },
  };
}

export class NotificationService {
  private smsClient: SMSClient | null | undefined;
  private emailClient: EmailClient | null | undefined;
  private readonly settings: NotificationSettings;
  private readonly logger: NonNullable<NotificationServiceOptions['logger']>;

  constructor(options: NotificationServiceOptions = {}) {
    this.settings = options.settings ?? disabledSettings;
    this.logger = options.logger ?? defaultLogger;
    if (typeof options.smsClient !== 'undefined') {
      this.smsClient = options.smsClient;
    }
    if (typeof options.emailClient !== 'undefined') {
      this.emailClient = options.emailClient;
    }
  }

  private getSMSClient(): SMSClient | null {
    if (this.smsClient !== undefined) {
      return this.smsClient;
    }

    try {
      this.smsClient = resolveSMSClient(this.settings);
    } catch (error) {
      this.smsClient = null;
      throw error;
    }

    return this.smsClient;
  }

  private getEmailClient(): EmailClient | null {
    if (this.emailClient === undefined) {
      this.emailClient = this.settings.smtp ? createSmtpClient(this.settings.smtp) : null;
    }
    return this.emailClient;
  }

  async sendSMS(to: string, message: string): Promise<boolean> {
    if (!this.settings.smsEnabled) {
      this.logger.debug?.(`SMS notifications disabled; skipping send to ${to}`);
      return false;
    }

    let client: SMSClient | null;
    try {
      client = this.getSMSClient();
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to initialize SMS provider');
      throw error;
    }

    if (!client) {
      const error = new Error('SMS provider is not configured');
      this.logger.error({ err: error }, error.message);
      throw error;
    }

    try {
      await client.send(to, message);
      this.logger.info({ to }, 'SMS sent successfully');
      return true;
    } catch (error) {
      this.logger.error({ err: error, to }, 'Failed to send SMS');
      throw error instanceof Error ? error : new Error('Failed to send SMS');
    }
  }

  async sendEmail(to: string, subject: string, html: string): Promise<boolean> {
    if (!this.settings.emailEnabled) {
      this.logger.debug?.(`Email notifications disabled; skipping send to ${to}`);
      return false;
    }

    const client = this.getEmailClient();
    if (!client) {
      this.logger.error({ to }, 'Email service not configured');
      throw new Error('Email service not configured');
    }

    await client.send({
      from: this.settings.smtp?.from || this.settings.smtp?.user || 'office-hours@localhost',
      to,
      subject,
      html,
    });

    this.logger.info({ to, subject }, 'Email sent');
    return true;
  }
}
