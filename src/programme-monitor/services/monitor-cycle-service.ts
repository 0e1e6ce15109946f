import type { Logger } from "pino";
import {
  CycleAbortedError,
  ShutdownForcedError,
  UpstreamError,
  errorMessage,
} from "../domain/errors.js";
import { assertTransition } from "../domain/market-cycle-state.js";
import {
  normalizeMarketKey,
  type Change,
  type CycleOutcome,
  type CycleReport,
  type DeliveryRecord,
  type MarketCycleState,
} from "../domain/models.js";
import type { ProgrammeSource } from "../providers/programme-source.js";
import type { SnapshotStore } from "../providers/snapshot-store.js";
import type { AlertDispatcher } from "./alert-dispatcher.js";
import { detectChanges, hasSameContent } from "./change-detector.js";
import type { OperatorAlertService } from "./operator-alert-service.js";

export type AlertToggles = {
  alertsEnabled: boolean;
  alertOnNew: boolean;
  alertOnRemoved: boolean;
  alertOnClosed: boolean;
};

export type MonitorCycleServiceOptions = {
  source: ProgrammeSource;
  store: SnapshotStore;
  dispatcher: Pick<AlertDispatcher, "dispatch">;
  logger: Logger;
  operatorAlerts?: Pick<OperatorAlertService, "notifyUpstreamFailure" | "notifyDeliveryFailures"> | null;
  toggles?: Partial<AlertToggles>;
  now?: () => Date;
};

export type RunCycleOptions = {
  /** Graceful cancellation: no new delivery attempt or backoff starts. */
  signal?: AbortSignal;
  /** Forced cancellation: the snapshot is never committed once aborted. */
  forceSignal?: AbortSignal;
  onStateChange?: (state: MarketCycleState) => void;
};

const DEFAULT_TOGGLES: AlertToggles = {
  alertsEnabled: true,
  alertOnNew: true,
  alertOnRemoved: true,
  alertOnClosed: true,
};

export class MonitorCycleService {
  private readonly source: ProgrammeSource;
  private readonly store: SnapshotStore;
  private readonly dispatcher: Pick<AlertDispatcher, "dispatch">;
  private readonly logger: Logger;
  private readonly operatorAlerts: MonitorCycleServiceOptions["operatorAlerts"];
  private readonly toggles: AlertToggles;
  private readonly now: () => Date;

  constructor(options: MonitorCycleServiceOptions) {
    this.source = options.source;
    this.store = options.store;
    this.dispatcher = options.dispatcher;
    this.logger = options.logger;
    this.operatorAlerts = options.operatorAlerts ?? null;
    this.toggles = { ...DEFAULT_TOGGLES, ...options.toggles };
    this.now = options.now ?? (() => new Date());
  }

  isAlertable(change: Change): boolean {
    if (!this.toggles.alertsEnabled) {
      return false;
    }
    switch (change.kind) {
      case "APPEARED":
        return this.toggles.alertOnNew;
      case "DISAPPEARED":
        return this.toggles.alertOnRemoved;
      case "CLOSING":
        return this.toggles.alertOnClosed;
    }
  }

  /**
   * Runs fetch, diff, dispatch and commit for one market. Every failure is
   * rethrown as `CycleAbortedError` carrying the state the cycle was in.
   */
  async runCycle(marketKey: string, options: RunCycleOptions = {}): Promise<CycleReport> {
    const key = normalizeMarketKey(marketKey);
    const startedAt = this.now();
    let state: MarketCycleState = "IDLE";
    const enter = (next: MarketCycleState): void => {
      state = assertTransition(state, next);
      options.onStateChange?.(state);
    };

    try {
      enter("FETCHING");
      const [fetched, loaded] = await Promise.allSettled([this.source.fetchActive(key), this.store.load(key)]);
      // An upstream failure takes precedence so a permanent one still reaches the operator.
      if (fetched.status === "rejected") {
        if (loaded.status === "rejected") {
          this.logger.error({ marketKey: key, error: errorMessage(loaded.reason) }, "Previous snapshot could not be loaded");
        }
        throw fetched.reason;
      }
      if (loaded.status === "rejected") {
        throw loaded.reason;
      }
      const current = fetched.value;
      const previous = loaded.value;

      enter("DIFFING");
      const changes = detectChanges(previous, current);

      if (previous && changes.length === 0 && hasSameContent(previous, current)) {
        enter("IDLE");
        this.logger.debug({ marketKey: key, programmes: current.programmes.size }, "No programme changes");
        return this.buildReport(key, "UNCHANGED", changes, [], false, startedAt);
      }

      let deliveries: DeliveryRecord[] = [];
      const alertable = changes.filter((change) => this.isAlertable(change));
      if (alertable.length < changes.length) {
        this.logger.info(
          { marketKey: key, suppressed: changes.length - alertable.length },
          "Programme changes suppressed by alert toggles",
        );
      }
      if (alertable.length > 0) {
        enter("DISPATCHING");
        deliveries = await this.dispatcher.dispatch(alertable, { signal: options.signal });
      }

      enter("COMMITTING");
      if (options.forceSignal?.aborted) {
        throw new ShutdownForcedError(key);
      }
      await this.store.commit(key, current);
      enter("IDLE");

      const failedCount = deliveries.filter((record) => record.status === "FAILED").length;
      if (failedCount > 0 && this.operatorAlerts) {
        await this.operatorAlerts.notifyDeliveryFailures(key, deliveries);
      }

      const outcome: CycleOutcome = previous === null ? "BASELINE" : failedCount > 0 ? "DEGRADED" : "COMPLETED";
      this.logger.info(
        {
          marketKey: key,
          outcome,
          programmes: current.programmes.size,
          appeared: changes.filter((change) => change.kind === "APPEARED").length,
          disappeared: changes.filter((change) => change.kind === "DISAPPEARED").length,
          closing: changes.filter((change) => change.kind === "CLOSING").length,
          failedDeliveries: failedCount,
        },
        "Market cycle committed",
      );
      return this.buildReport(key, outcome, changes, deliveries, true, startedAt);
    } catch (error) {
      const failedState: MarketCycleState = state;
      enter("ABORTED");
      if (error instanceof UpstreamError && error.isPermanent && this.operatorAlerts) {
        await this.operatorAlerts.notifyUpstreamFailure(key, error);
      }
      this.logger.debug({ marketKey: key, state: failedState, error: errorMessage(error) }, "Market cycle aborted");
      throw new CycleAbortedError(key, failedState, error);
    }
  }

  private buildReport(
    marketKey: string,
    outcome: CycleOutcome,
    changes: Change[],
    deliveries: DeliveryRecord[],
    committed: boolean,
    startedAt: Date,
  ): CycleReport {
    return { marketKey, outcome, changes, deliveries, committed, startedAt, finishedAt: this.now() };
  }
}
