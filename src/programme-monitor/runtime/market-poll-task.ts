import type { Logger } from "pino";
import { CycleAbortedError, classifyCycleFailure } from "../domain/errors.js";
import { assertTransition } from "../domain/market-cycle-state.js";
import type { MarketCycleState, MarketRunResult } from "../domain/models.js";
import type { MonitorCycleService } from "../services/monitor-cycle-service.js";
import type { OperatorStatusService } from "../services/operator-status-service.js";

export type MarketPollTaskOptions = {
  marketKey: string;
  intervalMs: number;
  runOnStart: boolean;
  cycleService: Pick<MonitorCycleService, "runCycle">;
  logger: Logger;
  statusService?: OperatorStatusService | null;
  now?: () => number;
};

export type MarketStopReport = {
  marketKey: string;
  state: MarketCycleState;
  hadInFlightCycle: boolean;
  forced: boolean;
  result: MarketRunResult | null;
};

const STOPPED_RESULT: MarketRunResult = { status: "aborted", error: "Poll scheduler is stopped." };

/**
 * Owns the timer, cancellation controllers and cycle state of one market.
 * Cycles never overlap: the next tick is armed only after the current cycle
 * settles.
 */
export class MarketPollTask {
  readonly marketKey: string;
  private readonly intervalMs: number;
  private readonly runOnStart: boolean;
  private readonly cycleService: Pick<MonitorCycleService, "runCycle">;
  private readonly logger: Logger;
  private readonly statusService: OperatorStatusService | null;
  private readonly now: () => number;

  private state: MarketCycleState = "IDLE";
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<MarketRunResult> | null = null;
  private readonly gracefulController = new AbortController();
  private readonly forceController = new AbortController();
  private started = false;
  private stopped = false;

  constructor(options: MarketPollTaskOptions) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new Error("intervalMs must be a positive number.");
    }
    this.marketKey = options.marketKey;
    this.intervalMs = options.intervalMs;
    this.runOnStart = options.runOnStart;
    this.cycleService = options.cycleService;
    this.logger = options.logger.child({ marketKey: options.marketKey });
    this.statusService = options.statusService ?? null;
    this.now = options.now ?? (() => Date.now());
  }

  getState(): MarketCycleState {
    return this.state;
  }

  isRunning(): boolean {
    return this.inFlight !== null;
  }

  start(): void {
    if (this.started || this.stopped) {
      return;
    }
    this.started = true;
    this.scheduleNext(this.runOnStart ? 0 : this.intervalMs);
  }

  /** Runs a cycle now, or joins the one already in flight. */
  runNow(): Promise<MarketRunResult> {
    if (this.inFlight) {
      return this.inFlight;
    }
    if (this.stopped) {
      return Promise.resolve(STOPPED_RESULT);
    }
    this.clearTimer();
    return this.execute();
  }

  async stop(graceMs: number): Promise<MarketStopReport> {
    this.stopped = true;
    this.clearTimer();
    this.gracefulController.abort();

    const inFlight = this.inFlight;
    if (!inFlight) {
      return { marketKey: this.marketKey, state: this.state, hadInFlightCycle: false, forced: false, result: null };
    }

    let graceTimer: ReturnType<typeof setTimeout> | null = null;
    const timeout = new Promise<"timeout">((resolve) => {
      graceTimer = setTimeout(() => resolve("timeout"), Math.max(0, graceMs));
    });
    const outcome = await Promise.race([inFlight, timeout]);
    if (graceTimer) {
      clearTimeout(graceTimer);
    }

    if (outcome === "timeout") {
      this.forceController.abort();
      this.logger.warn(
        { state: this.state, graceMs },
        "Cycle still in flight after shutdown grace period; forcing abort without commit",
      );
      return { marketKey: this.marketKey, state: this.state, hadInFlightCycle: true, forced: true, result: null };
    }
    return { marketKey: this.marketKey, state: this.state, hadInFlightCycle: true, forced: false, result: outcome };
  }

  private scheduleNext(delayMs: number): void {
    if (this.stopped) {
      return;
    }
    this.clearTimer();
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.execute().catch((error) => {
        this.logger.error({ err: error }, "Unexpected poll task failure");
      });
    }, delayMs);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private execute(): Promise<MarketRunResult> {
    if (this.inFlight) {
      return this.inFlight;
    }
    const startedAtMs = this.now();
    const run = this.runOnce().finally(() => {
      this.inFlight = null;
      if (this.started && !this.stopped) {
        const elapsedMs = this.now() - startedAtMs;
        this.scheduleNext(Math.max(0, this.intervalMs - elapsedMs));
      }
    });
    this.inFlight = run;
    return run;
  }

  private async runOnce(): Promise<MarketRunResult> {
    if (this.state === "ABORTED") {
      this.setState("IDLE");
    }
    try {
      const report = await this.cycleService.runCycle(this.marketKey, {
        signal: this.gracefulController.signal,
        forceSignal: this.forceController.signal,
        onStateChange: (state) => this.setState(state),
      });
      this.statusService?.recordCompleted(report);
      return { status: "completed", report };
    } catch (error) {
      const aborted =
        error instanceof CycleAbortedError ? error : new CycleAbortedError(this.marketKey, this.state, error);
      if (this.state !== "ABORTED") {
        this.setState("ABORTED");
      }
      this.statusService?.recordAborted(this.marketKey, aborted);
      this.logger.error(
        { state: aborted.state, kind: classifyCycleFailure(aborted) },
        aborted.message,
      );
      return { status: "aborted", error: aborted.message };
    }
  }

  private setState(next: MarketCycleState): void {
    this.state = assertTransition(this.state, next);
    this.statusService?.recordState(this.marketKey, this.state);
  }
}
