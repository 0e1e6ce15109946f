import { describe, expect, it } from "vitest";
import { CycleAbortedError, StorageError } from "../../../../src/programme-monitor/domain/errors.js";
import type { CycleReport, DeliveryRecord } from "../../../../src/programme-monitor/domain/models.js";
import {
  MAX_RECENT_FAILED_DELIVERIES,
  OperatorStatusService,
} from "../../../../src/programme-monitor/services/operator-status-service.js";
import { T0 } from "../../../support/programme-monitor-fakes.js";

const T1 = new Date("2026-03-01T09:00:05.000Z");

const failed = (programmeId: string): DeliveryRecord => ({
  change: { programmeId, kind: "DISAPPEARED", marketKey: "GB", detectedAt: T0, details: null },
  attempts: 5,
  lastAttemptAt: T1,
  status: "FAILED",
  lastError: "smtp down",
});

const report = (deliveries: DeliveryRecord[]): CycleReport => ({
  marketKey: "GB",
  outcome: deliveries.some((record) => record.status === "FAILED") ? "DEGRADED" : "COMPLETED",
  changes: deliveries.map((record) => record.change),
  deliveries,
  committed: true,
  startedAt: T0,
  finishedAt: T1,
});

describe("OperatorStatusService", () => {
  it("starts every configured market idle", () => {
    const service = new OperatorStatusService({ marketKeys: ["GB", "DE"], now: () => T1 });

    expect(service.getStatus().markets.map((market) => [market.marketKey, market.state])).toEqual([
      ["DE", "IDLE"],
      ["GB", "IDLE"],
    ]);
  });

  it("tracks state, outcome and consecutive failures", () => {
    const service = new OperatorStatusService({ marketKeys: ["GB"], now: () => T1 });

    service.recordState("GB", "FETCHING");
    expect(service.getMarketStatus("GB")?.lastCycleStartedAt).toBe("2026-03-01T09:00:05.000Z");

    const cause = new StorageError("disk full");
    service.recordAborted("GB", new CycleAbortedError("GB", "COMMITTING", cause));
    service.recordAborted("GB", new CycleAbortedError("GB", "COMMITTING", cause));
    expect(service.getMarketStatus("GB")).toMatchObject({
      lastOutcome: "ABORTED",
      consecutiveFailures: 2,
      lastError: {
        kind: "storage",
        message: "Cycle for market 'GB' aborted while COMMITTING: disk full",
        at: "2026-03-01T09:00:05.000Z",
      },
    });

    service.recordCompleted(report([]));
    expect(service.getMarketStatus("GB")).toMatchObject({
      lastOutcome: "COMPLETED",
      consecutiveFailures: 0,
      lastCycleFinishedAt: "2026-03-01T09:00:05.000Z",
    });
  });

  it("keeps only the most recent failed deliveries, newest first", () => {
    const service = new OperatorStatusService({ now: () => T1 });
    for (let index = 0; index < MAX_RECENT_FAILED_DELIVERIES + 5; index += 1) {
      service.recordCompleted(report([failed(String(index))]));
    }

    const recent = service.getStatus().recentFailedDeliveries;
    expect(recent).toHaveLength(MAX_RECENT_FAILED_DELIVERIES);
    expect(recent[0]).toEqual({
      marketKey: "GB",
      programmeId: "54",
      kind: "DISAPPEARED",
      attempts: 5,
      lastAttemptAt: "2026-03-01T09:00:05.000Z",
      lastError: "smtp down",
    });
    expect(recent.at(-1)?.programmeId).toBe("5");
  });

  it("returns copies that callers cannot mutate", () => {
    const service = new OperatorStatusService({ marketKeys: ["GB"] });
    const snapshot = service.getMarketStatus("GB");
    if (snapshot) {
      snapshot.consecutiveFailures = 99;
    }
    expect(service.getMarketStatus("GB")?.consecutiveFailures).toBe(0);
    expect(service.getMarketStatus("FR")).toBeNull();
  });
});
