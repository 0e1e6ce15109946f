import { classifyCycleFailure, errorMessage, type OperatorErrorKind } from "../domain/errors.js";
import type { CycleOutcome, CycleReport, DeliveryRecord, MarketCycleState } from "../domain/models.js";

export const MAX_RECENT_FAILED_DELIVERIES = 50;

export type OperatorErrorSummary = {
  kind: OperatorErrorKind;
  message: string;
  at: string;
};

export type FailedDeliverySummary = {
  marketKey: string;
  programmeId: string;
  kind: string;
  attempts: number;
  lastAttemptAt: string | null;
  lastError: string | null;
};

export type MarketStatus = {
  marketKey: string;
  state: MarketCycleState;
  lastCycleStartedAt: string | null;
  lastCycleFinishedAt: string | null;
  lastOutcome: CycleOutcome | "ABORTED" | null;
  lastError: OperatorErrorSummary | null;
  consecutiveFailures: number;
};

export type MonitorStatus = {
  markets: MarketStatus[];
  recentFailedDeliveries: FailedDeliverySummary[];
};

const toFailedDeliverySummary = (record: DeliveryRecord): FailedDeliverySummary => ({
  marketKey: record.change.marketKey,
  programmeId: record.change.programmeId,
  kind: record.change.kind,
  attempts: record.attempts,
  lastAttemptAt: record.lastAttemptAt ? record.lastAttemptAt.toISOString() : null,
  lastError: record.lastError,
});

export class OperatorStatusService {
  private readonly markets = new Map<string, MarketStatus>();
  private recentFailedDeliveries: FailedDeliverySummary[] = [];
  private readonly now: () => Date;

  constructor(options: { marketKeys?: readonly string[]; now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
    for (const marketKey of options.marketKeys ?? []) {
      this.ensureMarket(marketKey);
    }
  }

  recordState(marketKey: string, state: MarketCycleState): void {
    const status = this.ensureMarket(marketKey);
    status.state = state;
    if (state === "FETCHING") {
      status.lastCycleStartedAt = this.now().toISOString();
    }
  }

  recordCompleted(report: CycleReport): void {
    const status = this.ensureMarket(report.marketKey);
    status.lastCycleStartedAt = report.startedAt.toISOString();
    status.lastCycleFinishedAt = report.finishedAt.toISOString();
    status.lastOutcome = report.outcome;
    status.consecutiveFailures = 0;

    const failed = report.deliveries.filter((record) => record.status === "FAILED");
    if (failed.length > 0) {
      this.recentFailedDeliveries = [
        ...failed.map(toFailedDeliverySummary).reverse(),
        ...this.recentFailedDeliveries,
      ].slice(0, MAX_RECENT_FAILED_DELIVERIES);
    }
  }

  recordAborted(marketKey: string, error: unknown): void {
    const status = this.ensureMarket(marketKey);
    const at = this.now().toISOString();
    status.lastCycleFinishedAt = at;
    status.lastOutcome = "ABORTED";
    status.consecutiveFailures += 1;
    status.lastError = {
      kind: classifyCycleFailure(error),
      message: errorMessage(error),
      at,
    };
  }

  getMarketStatus(marketKey: string): MarketStatus | null {
    const status = this.markets.get(marketKey);
    return status ? { ...status } : null;
  }

  getStatus(): MonitorStatus {
    return {
      markets: Array.from(this.markets.values())
        .map((status) => ({ ...status }))
        .sort((left, right) => left.marketKey.localeCompare(right.marketKey)),
      recentFailedDeliveries: [...this.recentFailedDeliveries],
    };
  }

  private ensureMarket(marketKey: string): MarketStatus {
    const existing = this.markets.get(marketKey);
    if (existing) {
      return existing;
    }
    const created: MarketStatus = {
      marketKey,
      state: "IDLE",
      lastCycleStartedAt: null,
      lastCycleFinishedAt: null,
      lastOutcome: null,
      lastError: null,
      consecutiveFailures: 0,
    };
    this.markets.set(marketKey, created);
    return created;
  }
}
