import { describe, expect, it } from "vitest";
import {
  InvalidCycleTransitionError,
  assertTransition,
  canTransition,
} from "../../../../src/programme-monitor/domain/market-cycle-state.js";
import type { MarketCycleState } from "../../../../src/programme-monitor/domain/models.js";

const ALL_STATES: MarketCycleState[] = ["IDLE", "FETCHING", "DIFFING", "DISPATCHING", "COMMITTING", "ABORTED"];

describe("market cycle state machine", () => {
  it("allows the full cycle path and its shortcuts", () => {
    expect(canTransition("IDLE", "FETCHING")).toBe(true);
    expect(canTransition("FETCHING", "DIFFING")).toBe(true);
    expect(canTransition("DIFFING", "DISPATCHING")).toBe(true);
    expect(canTransition("DIFFING", "COMMITTING")).toBe(true);
    expect(canTransition("DIFFING", "IDLE")).toBe(true);
    expect(canTransition("DISPATCHING", "COMMITTING")).toBe(true);
    expect(canTransition("COMMITTING", "IDLE")).toBe(true);
    expect(canTransition("ABORTED", "IDLE")).toBe(true);
  });

  it("allows ABORTED from every state", () => {
    for (const state of ALL_STATES) {
      expect(canTransition(state, "ABORTED")).toBe(true);
    }
  });

  it("rejects skipping stages", () => {
    expect(canTransition("IDLE", "DIFFING")).toBe(false);
    expect(canTransition("FETCHING", "COMMITTING")).toBe(false);
    expect(canTransition("DISPATCHING", "IDLE")).toBe(false);
    expect(canTransition("ABORTED", "FETCHING")).toBe(false);
  });

  it("throws a typed error for invalid transitions", () => {
    expect(assertTransition("IDLE", "FETCHING")).toBe("FETCHING");
    expect(() => assertTransition("COMMITTING", "DISPATCHING")).toThrow(InvalidCycleTransitionError);
    expect(() => assertTransition("COMMITTING", "DISPATCHING")).toThrow(
      "Invalid market cycle transition COMMITTING -> DISPATCHING.",
    );
  });
});
