import nodemailer from 'nodemailer';
import { config } from '../../config/env';

export type SendEmailParams = {
  to: string | string[];
  subject: string;
  text: string;
  html?: string;
  replyTo?: string;
};

export interface EmailSender {
  sendEmail(params: SendEmailParams): Promise<void>;
}

export class GmailSmtpProvider implements EmailSender {
  private transporter: nodemailer.Transporter;
  private fromEmail: string;
  private fromName: string;
  private defaultReplyTo?: string;

  constructor(user: string, pass: string) {
    this.fromEmail = user;
    this.fromName = config.EMAIL_FROM_NAME || 'Invoice review';
    this.defaultReplyTo = config.EMAIL_REPLY_TO;

    this.transporter = nodemailer.createTransport({
      service: 'gmail',
      auth: { user, pass },
    });
  }

  async sendEmail(params: SendEmailParams): Promise<void> {
    const toList = Array.isArray(params.to) ? params.to : [params.to];

    if (toList.length === 0) return;

    await this.transporter.sendMail({
      from: `${this.fromName} <${this.fromEmail}>`,
      to: toList.join(','),
      subject: params.subject,
      text: params.text,
      html: params.html,
      replyTo: params.replyTo || this.defaultReplyTo || this.fromEmail,
    });
  }
}

/** Null when the SMTP credentials are not configured. */
export function createGmailProviderFromConfig(): GmailSmtpProvider | null {
  if (!config.GMAIL_ALERTS_USER || !config.GMAIL_APP_PASSWORD) return null;
  return new GmailSmtpProvider(config.GMAIL_ALERTS_USER, config.GMAIL_APP_PASSWORD);
}
