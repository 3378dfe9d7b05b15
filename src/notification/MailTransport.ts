import fs from 'fs/promises';
import path from 'path';
import nodemailer, { Transporter } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport/index.js';
import { MonitorConfig } from '../config/MonitorConfig.js';
import { describeError } from '../errors/MonitorError.js';
import { logger } from '../utils/logger.js';

export type TransportResult =
  | { ok: true; mode: 'smtp' | 'outbox'; messageId?: string }
  | { ok: false; reason: string };

/**
 * Delivers one plain-text message. Implementations report failure through the
 * result rather than by rejecting, though callers still guard against a throw.
 */
export interface MailTransport {
  send(to: string, subject: string, body: string): Promise<TransportResult>;
  close(): Promise<void>;
}

type MailSettings = MonitorConfig['mail'];

function formatSender(settings: MailSettings): string {
  return `"${settings.fromName}" <${settings.from}>`;
}

function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

/**
 * SMTP delivery through nodemailer. Every send goes through one transporter,
 * which opens a connection per message; close() releases it.
 */
export class SmtpMailTransport implements MailTransport {
  private readonly transporter: Transporter<SMTPTransport.SentMessageInfo>;

  constructor(private readonly settings: MailSettings) {
    if (settings.smtpUrl) {
      this.transporter = nodemailer.createTransport(settings.smtpUrl);
    } else {
      this.transporter = nodemailer.createTransport({
        host: settings.host,
        port: settings.port,
        secure: settings.secure,
        auth: settings.user ? { user: settings.user, pass: settings.password } : undefined,
        connectionTimeout: settings.timeoutMs,
        greetingTimeout: settings.timeoutMs,
        socketTimeout: settings.timeoutMs
      });
    }
  }

  async send(to: string, subject: string, body: string): Promise<TransportResult> {
    try {
      const info = await withTimeout(
        this.transporter.sendMail({
          from: formatSender(this.settings),
          to,
          subject,
          text: body
        }),
        this.settings.timeoutMs,
        'SMTP send'
      );

      if (info.rejected.length > 0) {
        return { ok: false, reason: `Recipient rejected by server: ${to}` };
      }

      return { ok: true, mode: 'smtp', messageId: info.messageId };
    } catch (error) {
      return { ok: false, reason: describeError(error) };
    }
  }

  async close(): Promise<void> {
    this.transporter.close();
  }
}

/**
 * Development delivery: each message becomes a text file in the outbox
 * directory instead of leaving the machine
 */
export class OutboxMailTransport implements MailTransport {
  private sequence = 0;

  constructor(
    private readonly outboxDir: string,
    private readonly sender: string = 'no-reply@lms.local'
  ) {}

  async send(to: string, subject: string, body: string): Promise<TransportResult> {
    try {
      await fs.mkdir(this.outboxDir, { recursive: true });
      const stamp = new Date().toISOString().replace(/[:.]/g, '-');
      this.sequence++;
      const file = path.join(this.outboxDir, `email_${stamp}_${this.sequence}.txt`);
      await fs.writeFile(file, `FROM: ${this.sender}\nTO: ${to}\nSUBJECT: ${subject}\n\n${body}\n`, 'utf8');
      return { ok: true, mode: 'outbox' };
    } catch (error) {
      return { ok: false, reason: describeError(error) };
    }
  }

  async close(): Promise<void> {
    // Nothing held open
  }
}

/**
 * SMTP when a server is configured, the outbox otherwise
 */
export function createMailTransport(config: MonitorConfig): MailTransport {
  if (config.mail.smtpUrl || config.mail.host) {
    logger.info('Using SMTP mail transport', { host: config.mail.host ?? 'from SMTP_URL' });
    return new SmtpMailTransport(config.mail);
  }

  logger.warn(`SMTP is not configured; writing messages to ${config.storage.outboxDir}`);
  return new OutboxMailTransport(config.storage.outboxDir, formatSender(config.mail));
}
