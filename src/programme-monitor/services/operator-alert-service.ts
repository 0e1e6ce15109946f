import type { Logger } from "pino";
import { errorMessage } from "../domain/errors.js";
import type { DeliveryRecord } from "../domain/models.js";
import type { AlertLogProvider } from "../providers/alert-log-provider.js";
import type { Notifier } from "../providers/notifier.js";
import { DEFAULT_SUBJECT_PREFIX } from "./alert-message-formatter.js";

export type OperatorAlertEvent = "upstream_failure" | "delivery_failure";

export type OperatorAlertServiceOptions = {
  notifier: Notifier;
  recipients: readonly string[];
  cooldownMs: number;
  logger: Logger;
  alertLog?: AlertLogProvider | null;
  subjectPrefix?: string;
  /** When false, feed failures are only logged. Defaults to true. */
  feedFailureAlerts?: boolean;
  now?: () => Date;
};

export type OperatorAlertResult = "sent" | "logged" | "throttled" | "failed" | "disabled";

/**
 * Operator-facing alerts, kept apart from programme-change alerts. Each
 * market and event is alerted at most once per cooldown window. Never throws.
 */
export class OperatorAlertService {
  private readonly notifier: Notifier;
  private readonly recipients: string[];
  private readonly cooldownMs: number;
  private readonly logger: Logger;
  private readonly alertLog: AlertLogProvider | null;
  private readonly subjectPrefix: string;
  private readonly feedFailureAlerts: boolean;
  private readonly now: () => Date;
  private readonly lastAlertAt = new Map<string, number>();

  constructor(options: OperatorAlertServiceOptions) {
    if (!Number.isFinite(options.cooldownMs) || options.cooldownMs < 0) {
      throw new Error("cooldownMs must be a non-negative number.");
    }
    this.notifier = options.notifier;
    this.recipients = options.recipients.map((value) => value.trim()).filter((value) => value.length > 0);
    this.cooldownMs = options.cooldownMs;
    this.logger = options.logger;
    this.alertLog = options.alertLog ?? null;
    this.subjectPrefix = (options.subjectPrefix ?? DEFAULT_SUBJECT_PREFIX).trim();
    this.feedFailureAlerts = options.feedFailureAlerts ?? true;
    this.now = options.now ?? (() => new Date());
  }

  async notifyUpstreamFailure(marketKey: string, error: unknown): Promise<OperatorAlertResult> {
    const message = errorMessage(error);
    if (!this.feedFailureAlerts) {
      this.logger.warn({ marketKey, error: message }, "Feed failure alert disabled; not notifying operators");
      return "disabled";
    }
    return this.raise(marketKey, "upstream_failure", {
      subject: `Feed failure for ${marketKey}`,
      body: [`Market: ${marketKey}`, `Error: ${message}`, `Time: ${this.now().toISOString()}`].join("\n"),
      details: message,
    });
  }

  async notifyDeliveryFailures(
    marketKey: string,
    records: readonly DeliveryRecord[],
  ): Promise<OperatorAlertResult | null> {
    const failed = records.filter((record) => record.status === "FAILED");
    if (failed.length === 0) {
      return null;
    }
    const lines = failed.map(
      (record) =>
        `- ${record.change.kind} ${record.change.programmeId} (${record.attempts} attempt(s)): ${record.lastError ?? "unknown error"}`,
    );
    return this.raise(marketKey, "delivery_failure", {
      subject: `${failed.length} alert(s) undeliverable for ${marketKey}`,
      body: [`Market: ${marketKey}`, `Time: ${this.now().toISOString()}`, "", ...lines].join("\n"),
      details: `${failed.length} failed delivery(ies)`,
    });
  }

  private async raise(
    marketKey: string,
    event: OperatorAlertEvent,
    message: { subject: string; body: string; details: string },
  ): Promise<OperatorAlertResult> {
    const key = `${marketKey}:${event}`;
    const nowMs = this.now().getTime();
    const last = this.lastAlertAt.get(key);
    if (last !== undefined && nowMs - last < this.cooldownMs) {
      this.logger.debug({ marketKey, event }, "Operator alert throttled by cooldown");
      return "throttled";
    }
    this.lastAlertAt.set(key, nowMs);

    const subject = this.subjectPrefix ? `${this.subjectPrefix} ${message.subject}` : message.subject;
    let result: OperatorAlertResult;
    let emailInfo: string;

    if (this.recipients.length === 0) {
      this.logger.error({ marketKey, event, details: message.details }, `Operator alert: ${message.subject}`);
      result = "logged";
      emailInfo = "no operator recipients configured";
    } else {
      try {
        const outcome = await this.notifier.send(this.recipients, subject, message.body);
        result = outcome.emailed ? "sent" : "logged";
        emailInfo = outcome.emailed ? `sent to ${this.recipients.join(", ")}` : outcome.info;
      } catch (error) {
        this.logger.error(
          { marketKey, event, error: errorMessage(error) },
          "Failed to send operator alert",
        );
        result = "failed";
        emailInfo = errorMessage(error);
      }
    }

    if (this.alertLog) {
      try {
        await this.alertLog.append({
          ts: new Date(nowMs).toISOString(),
          event,
          marketKey,
          programmeId: null,
          name: null,
          details: message.details,
          emailSent: result === "sent",
          emailInfo,
        });
      } catch (error) {
        this.logger.error({ marketKey, event, error: errorMessage(error) }, "Failed to append alert log entry");
      }
    }
    return result;
  }
}
