import type { MarketCycleState } from "./models.js";

export type UpstreamErrorKind = "transient" | "permanent";

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

export class StorageError extends Error {
  readonly marketKey: string | null;

  constructor(message: string, options: { marketKey?: string | null; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "StorageError";
    this.marketKey = options.marketKey ?? null;
  }
}

export class UpstreamError extends Error {
  readonly kind: UpstreamErrorKind;
  readonly statusCode: number | null;

  constructor(
    kind: UpstreamErrorKind,
    message: string,
    options: { statusCode?: number | null; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "UpstreamError";
    this.kind = kind;
    this.statusCode = options.statusCode ?? null;
  }

  get isPermanent(): boolean {
    return this.kind === "permanent";
  }
}

export class NotifyError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "NotifyError";
  }
}

export class DispatchCancelledError extends Error {
  readonly pendingChanges: number;

  constructor(pendingChanges: number) {
    super(`Alert dispatch cancelled with ${pendingChanges} change(s) not yet terminal.`);
    this.name = "DispatchCancelledError";
    this.pendingChanges = pendingChanges;
  }
}

export class ShutdownForcedError extends Error {
  constructor(marketKey: string) {
    super(`Commit for market '${marketKey}' refused after forced shutdown.`);
    this.name = "ShutdownForcedError";
  }
}

export class CycleAbortedError extends Error {
  readonly marketKey: string;
  readonly state: MarketCycleState;

  constructor(marketKey: string, state: MarketCycleState, cause: unknown) {
    super(`Cycle for market '${marketKey}' aborted while ${state}: ${describeCause(cause)}`, {
      cause,
    });
    this.name = "CycleAbortedError";
    this.marketKey = marketKey;
    this.state = state;
  }
}

export type OperatorErrorKind =
  | "storage"
  | "upstream_transient"
  | "upstream_permanent"
  | "cancelled"
  | "unexpected";

export const classifyCycleFailure = (error: unknown): OperatorErrorKind => {
  const cause = error instanceof CycleAbortedError ? error.cause : error;
  if (cause instanceof StorageError) {
    return "storage";
  }
  if (cause instanceof UpstreamError) {
    return cause.isPermanent ? "upstream_permanent" : "upstream_transient";
  }
  if (cause instanceof DispatchCancelledError || cause instanceof ShutdownForcedError) {
    return "cancelled";
  }
  return "unexpected";
};

export const errorMessage = describeCause;
