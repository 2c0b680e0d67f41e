import { createTransport } from 'nodemailer';
import type { Env } from '../config/env.js';
import { getLogger } from '../lib/logger.js';
import type { NotificationMessage } from './notify.js';

export interface OutgoingMail extends NotificationMessage {
  to: string;
}

export interface Mailer {
  send(mail: OutgoingMail): Promise<void>;
}

export interface MailConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  recipient: string;
  timeoutMs: number;
}

export class MailConfigError extends Error {
  constructor(public readonly missing: string[]) {
    super(`Email settings missing: ${missing.join(', ')}`);
    this.name = 'MailConfigError';
  }
}

export class MailDeliveryError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'MailDeliveryError';
  }
}

/**
 * Build mail settings from the environment, naming every missing credential.
 */
export function assertMailConfig(env: Env): MailConfig {
  const missing: string[] = [];
  if (!env.RECIPIENT_EMAIL) missing.push('RECIPIENT_EMAIL');
  if (!env.GMAIL_ADDRESS) missing.push('GMAIL_ADDRESS');
  if (!env.GMAIL_PASSWORD) missing.push('GMAIL_PASSWORD');

  if (!env.RECIPIENT_EMAIL || !env.GMAIL_ADDRESS || !env.GMAIL_PASSWORD) {
    throw new MailConfigError(missing);
  }

  return {
    host: env.SMTP_HOST,
    port: env.SMTP_PORT,
    user: env.GMAIL_ADDRESS,
    password: env.GMAIL_PASSWORD,
    recipient: env.RECIPIENT_EMAIL,
    timeoutMs: env.SMTP_TIMEOUT_MS,
  };
}

export function createMailer(config: MailConfig): Mailer {
  const transporter = createTransport({
    host: config.host,
    port: config.port,
    secure: config.port === 465,
    requireTLS: config.port !== 465,
    auth: {
      user: config.user,
      pass: config.password,
    },
    connectionTimeout: config.timeoutMs,
    greetingTimeout: config.timeoutMs,
    socketTimeout: config.timeoutMs,
  });

  return {
    async send(mail: OutgoingMail): Promise<void> {
      const logger = getLogger();
      logger.info({ to: mail.to, subject: mail.subject }, 'Sending notification email');

      try {
        const info = await transporter.sendMail({
          from: config.user,
          to: mail.to,
          subject: mail.subject,
          text: mail.body,
        });
        logger.info({ messageId: info.messageId }, 'Notification email sent');
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new MailDeliveryError(`Email delivery failed: ${message}`, err);
      }
    },
  };
}
