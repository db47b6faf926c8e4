import nodemailer from 'nodemailer';
import type { MailMessage, MailReceipt, MailTransport } from '../types/collaborators.js';
import type { SmtpConfig } from '../lib/config.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('smtp');

/** The part of a nodemailer transporter this transport uses */
export interface Mailer {
  sendMail(mail: { from: string; to: string; subject: string; text: string; html?: string }): Promise<{
    messageId: string;
    accepted?: unknown[];
    rejected?: unknown[];
  }>;
}

export interface SmtpTransportOptions {
  smtp: SmtpConfig;
  from: string;
  /** Injected in tests */
  transporter?: Mailer;
}

/**
 * Mail transport over SMTP. A resolved `send` means the server accepted the message.
 */
export class SmtpTransport implements MailTransport {
  readonly name = 'smtp';
  private readonly transporter: Mailer;

  constructor(private readonly options: SmtpTransportOptions) {
    const { smtp } = options;
    this.transporter =
      options.transporter ??
      nodemailer.createTransport({
        host: smtp.host,
        port: smtp.port,
        secure: smtp.secure, // true for 465, false for other ports
        auth: smtp.user && smtp.pass ? { user: smtp.user, pass: smtp.pass } : undefined
      });
  }

  async send(message: MailMessage): Promise<MailReceipt> {
    const info = await this.transporter.sendMail({
      from: this.options.from,
      to: message.to,
      subject: message.subject,
      text: message.text,
      html: message.html ?? undefined
    });

    // SMTP can accept the envelope while refusing every recipient
    const rejected = (info.rejected ?? []).map(String);
    if (rejected.length > 0 && (info.accepted ?? []).length === 0) {
      throw new Error(`SMTP server rejected recipient(s): ${rejected.join(', ')}`);
    }

    log.verbose(`Sent "${message.subject}" to ${message.to} (${info.messageId})`);
    return { messageId: info.messageId };
  }
}
