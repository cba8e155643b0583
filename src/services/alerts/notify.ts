import nodemailer from 'nodemailer';
import { ConfigError } from '../../errors';
import type { Listing } from '../../types';
import {
  DEFAULT_TEMPLATE,
  escapeHtml,
  listingsAsHtml,
  listingsAsText,
  renderTemplate,
  type SummaryTemplate,
} from './template';

export interface NotifyContext {
  location: string;
}

/** Sends one summary message for the selected listings. */
export interface SummaryNotifier {
  send(listings: Listing[], context: NotifyContext): Promise<void>;
}

export interface MailMessage {
  from: string;
  to: string[];
  subject: string;
  text: string;
  html: string;
}

export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
}

export interface SmtpSettings {
  host: string;
  port: number;
  secure: boolean;
  user: string | null;
  pass: string | null;
}

export function createSmtpTransport(smtp: SmtpSettings): MailTransport {
  if (!smtp.user || !smtp.pass) {
    throw new ConfigError('Missing SMTP credentials. Set SMTP_USER/SMTP_PASS.');
  }
  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.secure,
    auth: { user: smtp.user, pass: smtp.pass },
  });
}

/**
 * Listings worth mailing: those scored at or above minScore, or every listing
 * when nothing was scored in this run.
 */
export function selectForSummary(listings: Listing[], minScore: number): Listing[] {
  const anyScored = listings.some((l) => l.score);
  if (!anyScored) return listings;
  return listings
    .filter((l) => l.score && l.score.score >= minScore)
    .sort((a, b) => (b.score?.score ?? 0) - (a.score?.score ?? 0));
}

export class EmailNotifier implements SummaryNotifier {
  constructor(
    private readonly transport: MailTransport,
    private readonly addresses: { from: string; to: string[] },
    private readonly template: SummaryTemplate = DEFAULT_TEMPLATE,
  ) {
    if (!addresses.to.length) throw new ConfigError('ALERT_TO_EMAIL is not set');
  }

  async send(listings: Listing[], context: NotifyContext): Promise<void> {
    const vars = { location: context.location, count: String(listings.length) };
    await this.transport.sendMail({
      from: this.addresses.from,
      to: this.addresses.to,
      subject: renderTemplate(this.template.subject, { ...vars, listings: '' }).trim(),
      text: renderTemplate(this.template.text, { ...vars, listings: listingsAsText(listings) }),
      html: this.template.html
        ? renderTemplate(this.template.html, { ...vars, location: escapeHtml(context.location), listings: listingsAsHtml(listings) })
        : '',
    });
  }
}
