/**
 * EmailService - thin wrapper around a nodemailer transport
 *
 * `smtp` sends through the configured server. `json` renders the message in
 * process and logs it, which is what development and the tests use.
 */

import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type { DomainLogger } from '../../infrastructure/logging/domain-logger.js';

const OUTBOX_SIZE = 100;

export type EmailTransportKind = 'smtp' | 'json';

export interface EmailServiceOptions {
  transport: EmailTransportKind;
  from: string;
  smtp: {
    host: string;
    port: number;
    secure: boolean;
    user?: string;
    pass?: string;
  };
  logger?: DomainLogger;
}

export interface OutgoingEmail {
  to: string;
  subject: string;
  text: string;
  html?: string;
}

export interface SentEmail {
  messageId: string;
  /** Rendered message; only the json transport fills it */
  preview?: string;
}

export class EmailService {
  private readonly transporter: Transporter;
  private readonly sent: OutgoingEmail[] = [];

  constructor(private readonly options: EmailServiceOptions) {
    this.transporter =
      options.transport === 'smtp'
        ? nodemailer.createTransport({
            host: options.smtp.host,
            port: options.smtp.port,
            secure: options.smtp.secure,
            auth:
              options.smtp.user !== undefined
                ? { user: options.smtp.user, pass: options.smtp.pass ?? '' }
                : undefined,
          })
        : nodemailer.createTransport({ jsonTransport: true });
  }

  public get transportKind(): EmailTransportKind {
    return this.options.transport;
  }

  public get from(): string {
    return this.options.from;
  }

  public async send(email: OutgoingEmail): Promise<SentEmail> {
    const info: { messageId: string; message?: unknown } = await this.transporter.sendMail({
      from: this.options.from,
      to: email.to,
      subject: email.subject,
      text: email.text,
      html: email.html,
    });
    this.sent.push(email);
    if (this.sent.length > OUTBOX_SIZE) {
      this.sent.shift();
    }
    const preview = typeof info.message === 'string' ? info.message : undefined;
    if (this.options.transport === 'json') {
      this.options.logger?.info?.(`E-mail to ${email.to}: ${email.subject}`, { messageId: info.messageId });
    } else {
      this.options.logger?.debug?.(`E-mail sent to ${email.to}`, { messageId: info.messageId });
    }
    return { messageId: info.messageId, preview };
  }

  /**
   * Check the SMTP connection. The json transport has nothing to verify.
   */
  public async verify(): Promise<boolean> {
    if (this.options.transport === 'json') {
      return true;
    }
    return this.transporter.verify();
  }

  /**
   * Last messages handed to the transport, oldest first
   */
  public get outbox(): readonly OutgoingEmail[] {
    return this.sent;
  }

  public close(): void {
    this.transporter.close();
  }
}
