import type { Logger } from "pino";
import { normalizeMarketKey, type MarketCycleState, type MarketRunResult } from "../domain/models.js";
import type { MonitorCycleService } from "../services/monitor-cycle-service.js";
import type { OperatorStatusService } from "../services/operator-status-service.js";
import { MarketPollTask, type MarketStopReport } from "./market-poll-task.js";

export type PollSchedulerOptions = {
  marketKeys: readonly string[];
  intervalMs: number;
  runOnStart: boolean;
  shutdownGraceMs: number;
  cycleService: Pick<MonitorCycleService, "runCycle">;
  logger: Logger;
  statusService?: OperatorStatusService | null;
  now?: () => number;
};

export type SchedulerStopReport = {
  forced: boolean;
  markets: MarketStopReport[];
};

export class UnknownMarketError extends Error {
  readonly marketKey: string;

  constructor(marketKey: string) {
    super(`Market '${marketKey}' is not monitored.`);
    this.name = "UnknownMarketError";
    this.marketKey = marketKey;
  }
}

export class PollScheduler {
  private readonly tasks = new Map<string, MarketPollTask>();
  private readonly shutdownGraceMs: number;
  private readonly logger: Logger;
  private stopPromise: Promise<SchedulerStopReport> | null = null;
  private started = false;

  constructor(options: PollSchedulerOptions) {
    if (!Number.isFinite(options.shutdownGraceMs) || options.shutdownGraceMs < 0) {
      throw new Error("shutdownGraceMs must be a non-negative number.");
    }
    this.shutdownGraceMs = options.shutdownGraceMs;
    this.logger = options.logger;

    for (const rawKey of options.marketKeys) {
      const marketKey = normalizeMarketKey(rawKey);
      if (this.tasks.has(marketKey)) {
        continue;
      }
      this.tasks.set(
        marketKey,
        new MarketPollTask({
          marketKey,
          intervalMs: options.intervalMs,
          runOnStart: options.runOnStart,
          cycleService: options.cycleService,
          logger: options.logger,
          statusService: options.statusService,
          now: options.now,
        }),
      );
    }
    if (this.tasks.size === 0) {
      throw new Error("PollScheduler requires at least one market.");
    }
  }

  getMarketKeys(): string[] {
    return Array.from(this.tasks.keys());
  }

  hasMarket(marketKey: string): boolean {
    return this.tasks.has(marketKey.trim().toUpperCase());
  }

  getStates(): Record<string, MarketCycleState> {
    const states: Record<string, MarketCycleState> = {};
    for (const [marketKey, task] of this.tasks) {
      states[marketKey] = task.getState();
    }
    return states;
  }

  start(): void {
    if (this.started || this.stopPromise) {
      return;
    }
    this.started = true;
    for (const task of this.tasks.values()) {
      task.start();
    }
    this.logger.info({ markets: this.getMarketKeys() }, "Programme monitor scheduler started");
  }

  /** @throws UnknownMarketError when the market is not configured. */
  runNow(marketKey: string): Promise<MarketRunResult> {
    const task = this.tasks.get(marketKey.trim().toUpperCase());
    if (!task) {
      return Promise.reject(new UnknownMarketError(marketKey));
    }
    return task.runNow();
  }

  stop(): Promise<SchedulerStopReport> {
    if (!this.stopPromise) {
      this.stopPromise = this.stopTasks();
    }
    return this.stopPromise;
  }

  private async stopTasks(): Promise<SchedulerStopReport> {
    const inFlight = Array.from(this.tasks.values())
      .filter((task) => task.isRunning())
      .map((task) => task.marketKey);
    this.logger.info({ inFlight, graceMs: this.shutdownGraceMs }, "Stopping programme monitor scheduler");

    const markets = await Promise.all(
      Array.from(this.tasks.values()).map((task) => task.stop(this.shutdownGraceMs)),
    );
    const forced = markets.some((report) => report.forced);
    if (forced) {
      this.logger.warn(
        { markets: markets.filter((report) => report.forced).map((report) => report.marketKey) },
        "Programme monitor stopped with forced aborts",
      );
    } else {
      this.logger.info("Programme monitor scheduler stopped");
    }
    return { forced, markets };
  }
}
