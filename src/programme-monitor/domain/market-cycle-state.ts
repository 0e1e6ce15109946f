import type { MarketCycleState } from "./models.js";

const ALLOWED_TRANSITIONS: Record<MarketCycleState, readonly MarketCycleState[]> = {
  IDLE: ["FETCHING"],
  FETCHING: ["DIFFING"],
  DIFFING: ["DISPATCHING", "COMMITTING", "IDLE"],
  DISPATCHING: ["COMMITTING"],
  COMMITTING: ["IDLE"],
  ABORTED: ["IDLE"],
};

export class InvalidCycleTransitionError extends Error {
  readonly from: MarketCycleState;
  readonly to: MarketCycleState;

  constructor(from: MarketCycleState, to: MarketCycleState) {
    super(`Invalid market cycle transition ${from} -> ${to}.`);
    this.name = "InvalidCycleTransitionError";
    this.from = from;
    this.to = to;
  }
}

// ABORTED is reachable from every state, including ABORTED itself.
export const canTransition = (from: MarketCycleState, to: MarketCycleState): boolean =>
  to === "ABORTED" || ALLOWED_TRANSITIONS[from].includes(to);

export const assertTransition = (from: MarketCycleState, to: MarketCycleState): MarketCycleState => {
  if (!canTransition(from, to)) {
    throw new InvalidCycleTransitionError(from, to);
  }
  return to;
};
