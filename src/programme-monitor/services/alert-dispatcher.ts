import type { Logger } from "pino";
import { DispatchCancelledError, errorMessage } from "../domain/errors.js";
import type { Change, ChangeKind, DeliveryRecord } from "../domain/models.js";
import type { AlertLogEvent, AlertLogProvider } from "../providers/alert-log-provider.js";
import type { Notifier, NotifyOutcome } from "../providers/notifier.js";
import { DEFAULT_SUBJECT_PREFIX, formatChangeAlert } from "./alert-message-formatter.js";

export type BackoffPolicy = {
  baseMs: number;
  factor: number;
  maxMs: number;
};

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export type AlertDispatcherOptions = {
  notifier: Notifier;
  recipients: readonly string[];
  logger: Logger;
  maxAttempts?: number;
  backoff?: Partial<BackoffPolicy>;
  subjectPrefix?: string;
  alertLog?: AlertLogProvider | null;
  sleep?: SleepFn;
  now?: () => Date;
};

export type DispatchOptions = {
  signal?: AbortSignal;
};

const LOG_EVENTS: Record<ChangeKind, AlertLogEvent> = {
  APPEARED: "new",
  DISAPPEARED: "removed",
  CLOSING: "closed",
};

const describeDetails = (change: Change): string => {
  const current = `status=${change.details?.status ?? "-"}; relationship=${change.details?.relationship ?? "-"}`;
  if (change.kind !== "CLOSING") {
    return current;
  }
  return `${current}; previous=${change.previousDetails?.status ?? "-"}/${change.previousDetails?.relationship ?? "-"}`;
};

const describeOutcome = (record: DeliveryRecord, outcome: NotifyOutcome | null): string => {
  if (!outcome) {
    return `failed after ${record.attempts} attempt(s): ${record.lastError ?? "unknown error"}`;
  }
  return outcome.emailed
    ? `delivered after ${record.attempts} attempt(s)`
    : `${outcome.info}; not emailed`;
};

export const DEFAULT_MAX_ATTEMPTS = 5;
export const DEFAULT_BACKOFF: BackoffPolicy = { baseMs: 2_000, factor: 2, maxMs: 60_000 };

/** Delay after the `failedAttempts`-th consecutive failure. */
export const computeBackoffDelayMs = (failedAttempts: number, policy: BackoffPolicy): number => {
  const exponent = Math.max(0, failedAttempts - 1);
  const delay = policy.baseMs * Math.pow(policy.factor, exponent);
  return Math.min(delay, policy.maxMs);
};

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export const abortableDelay: SleepFn = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(handle);
      resolve();
    };
    const handle = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

const normalizePositiveInteger = (value: number, label: string): number => {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${label} must be a positive integer.`);
  }
  return value;
};

const normalizeBackoff = (input: Partial<BackoffPolicy> | undefined): BackoffPolicy => {
  const policy = { ...DEFAULT_BACKOFF, ...input };
  if (!Number.isFinite(policy.baseMs) || policy.baseMs < 0) {
    throw new Error("backoff.baseMs must be a non-negative number.");
  }
  if (!Number.isFinite(policy.factor) || policy.factor < 1) {
    throw new Error("backoff.factor must be a number >= 1.");
  }
  if (!Number.isFinite(policy.maxMs) || policy.maxMs < policy.baseMs) {
    throw new Error("backoff.maxMs must be a number >= backoff.baseMs.");
  }
  return policy;
};

const countPending = (records: readonly DeliveryRecord[]): number =>
  records.filter((record) => record.status === "PENDING").length;

export class AlertDispatcher {
  private readonly notifier: Notifier;
  private readonly recipients: readonly string[];
  private readonly logger: Logger;
  private readonly maxAttempts: number;
  private readonly backoff: BackoffPolicy;
  private readonly subjectPrefix: string;
  private readonly alertLog: AlertLogProvider | null;
  private readonly sleep: SleepFn;
  private readonly now: () => Date;

  constructor(options: AlertDispatcherOptions) {
    this.notifier = options.notifier;
    this.recipients = [...options.recipients];
    this.logger = options.logger;
    this.maxAttempts = normalizePositiveInteger(options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS, "maxAttempts");
    this.backoff = normalizeBackoff(options.backoff);
    this.subjectPrefix = options.subjectPrefix ?? DEFAULT_SUBJECT_PREFIX;
    this.alertLog = options.alertLog ?? null;
    this.sleep = options.sleep ?? abortableDelay;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Delivers one alert per change, in order. Every returned record is
   * DELIVERED or FAILED. Rejects with `DispatchCancelledError` once `signal`
   * aborts; an attempt already in progress is allowed to finish first.
   */
  async dispatch(changes: readonly Change[], options: DispatchOptions = {}): Promise<DeliveryRecord[]> {
    const signal = options.signal;
    const records: DeliveryRecord[] = changes.map((change) => ({
      change,
      attempts: 0,
      lastAttemptAt: null,
      status: "PENDING",
      lastError: null,
    }));

    for (const record of records) {
      const outcome = await this.deliver(record, records, signal);
      await this.recordOutcome(record, outcome);
    }

    return records;
  }

  private async deliver(
    record: DeliveryRecord,
    records: readonly DeliveryRecord[],
    signal: AbortSignal | undefined,
  ): Promise<NotifyOutcome | null> {
    const message = formatChangeAlert(record.change, this.subjectPrefix);

    while (record.status === "PENDING") {
      if (signal?.aborted) {
        throw new DispatchCancelledError(countPending(records));
      }

      record.attempts += 1;
      record.lastAttemptAt = this.now();
      try {
        const outcome = await this.notifier.send(this.recipients, message.subject, message.body);
        record.status = "DELIVERED";
        record.lastError = null;
        return outcome;
      } catch (error) {
        record.lastError = errorMessage(error);
      }

      if (record.attempts >= this.maxAttempts) {
        record.status = "FAILED";
        this.logger.error(
          {
            marketKey: record.change.marketKey,
            programmeId: record.change.programmeId,
            kind: record.change.kind,
            attempts: record.attempts,
            error: record.lastError,
          },
          "Alert delivery failed after exhausting retries",
        );
        return null;
      }

      if (signal?.aborted) {
        throw new DispatchCancelledError(countPending(records));
      }
      const delayMs = computeBackoffDelayMs(record.attempts, this.backoff);
      this.logger.warn(
        {
          marketKey: record.change.marketKey,
          programmeId: record.change.programmeId,
          attempt: record.attempts,
          delayMs,
          error: record.lastError,
        },
        "Alert delivery attempt failed; retrying",
      );
      await this.sleep(delayMs, signal);
    }
    return null;
  }

  private async recordOutcome(record: DeliveryRecord, outcome: NotifyOutcome | null): Promise<void> {
    if (!this.alertLog) {
      return;
    }
    const { change } = record;
    const emailed = outcome?.emailed ?? false;
    try {
      await this.alertLog.append({
        ts: this.now().toISOString(),
        event: LOG_EVENTS[change.kind],
        marketKey: change.marketKey,
        programmeId: change.programmeId,
        name: change.details?.name ?? null,
        details: describeDetails(change),
        emailSent: emailed,
        emailInfo: describeOutcome(record, outcome),
      });
    } catch (error) {
      this.logger.error(
        { marketKey: change.marketKey, programmeId: change.programmeId, error: errorMessage(error) },
        "Failed to append alert log entry",
      );
    }
  }
}
