import nodemailer from "nodemailer";
import type { Logger } from "pino";
import { NotifyError } from "../domain/errors.js";
import type { Notifier, NotifyOutcome } from "./notifier.js";

export type SmtpSettings = {
  host: string | null;
  port: number;
  user: string | null;
  pass: string | null;
  secure: boolean;
};

export type MailMessage = {
  from: string;
  to: string[];
  subject: string;
  text: string;
};

export type MailTransport = {
  sendMail(message: MailMessage): Promise<{ rejected?: unknown[] }>;
};

const normalizeRecipients = (recipients: readonly string[]): string[] =>
  recipients.map((recipient) => recipient.trim()).filter((recipient) => recipient.length > 0);

export const isSmtpConfigured = (settings: SmtpSettings): boolean =>
  Boolean(settings.host && settings.user && settings.pass && settings.port > 0);

export class SmtpNotifier implements Notifier {
  private readonly transport: MailTransport;
  private readonly from: string;

  constructor(options: { from: string; settings?: SmtpSettings; transport?: MailTransport }) {
    const from = options.from.trim();
    if (from.length === 0) {
      throw new Error("Alert sender address must be a non-empty string.");
    }
    this.from = from;

    if (options.transport) {
      this.transport = options.transport;
      return;
    }

    const settings = options.settings;
    if (!settings || !isSmtpConfigured(settings) || !settings.host || !settings.user || !settings.pass) {
      throw new Error("SMTP configuration is incomplete");
    }
    this.transport = nodemailer.createTransport({
      host: settings.host,
      port: settings.port,
      secure: settings.secure,
      requireTLS: !settings.secure,
      auth: {
        user: settings.user,
        pass: settings.pass,
      },
    });
  }

  async send(recipients: readonly string[], subject: string, body: string): Promise<NotifyOutcome> {
    const to = normalizeRecipients(recipients);
    if (to.length === 0) {
      throw new NotifyError("No alert recipients configured.");
    }

    try {
      const info = await this.transport.sendMail({
        from: this.from,
        to,
        subject,
        text: body,
      });
      if (Array.isArray(info.rejected) && info.rejected.length >= to.length) {
        throw new NotifyError(`All recipients were rejected: ${info.rejected.map(String).join(", ")}`);
      }
      return { emailed: true, info: "sent" };
    } catch (error) {
      if (error instanceof NotifyError) {
        throw error;
      }
      throw new NotifyError(`SMTP send failed: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    }
  }
}

export const LOG_ONLY_INFO = "SMTP not fully configured";

/**
 * Stand-in used when SMTP is not configured: the alert is written to the log
 * and reported as not emailed.
 */
export class LogNotifier implements Notifier {
  constructor(private readonly logger: Logger) {}

  async send(recipients: readonly string[], subject: string, body: string): Promise<NotifyOutcome> {
    this.logger.warn(
      { recipients: normalizeRecipients(recipients), subject, body },
      "SMTP not configured; alert written to log instead of being emailed",
    );
    return { emailed: false, info: LOG_ONLY_INFO };
  }
}
