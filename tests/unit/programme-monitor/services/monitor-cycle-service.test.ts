import { describe, expect, it, vi } from "vitest";
import {
  CycleAbortedError,
  DispatchCancelledError,
  ShutdownForcedError,
  UpstreamError,
} from "../../../../src/programme-monitor/domain/errors.js";
import type { MarketCycleState } from "../../../../src/programme-monitor/domain/models.js";
import { createSilentLogger } from "../../../../src/logging/logger.js";
import { AlertDispatcher } from "../../../../src/programme-monitor/services/alert-dispatcher.js";
import {
  MonitorCycleService,
  type AlertToggles,
} from "../../../../src/programme-monitor/services/monitor-cycle-service.js";
import {
  InMemorySnapshotStore,
  RecordingNotifier,
  ScriptedProgrammeSource,
  T0,
  buildSnapshot,
  immediateSleep,
} from "../../../support/programme-monitor-fakes.js";

const T1 = new Date("2026-03-01T12:00:00.000Z");

const createHarness = (
  script: ConstructorParameters<typeof ScriptedProgrammeSource>[0],
  options: { notifier?: RecordingNotifier; toggles?: Partial<AlertToggles> } = {},
) => {
  const source = new ScriptedProgrammeSource(script);
  const store = new InMemorySnapshotStore();
  const notifier = options.notifier ?? new RecordingNotifier();
  const logger = createSilentLogger();
  const operatorAlerts = {
    notifyUpstreamFailure: vi.fn().mockResolvedValue("logged"),
    notifyDeliveryFailures: vi.fn().mockResolvedValue("logged"),
  };
  const dispatcher = new AlertDispatcher({
    notifier,
    recipients: ["ops@example.test"],
    logger,
    maxAttempts: 5,
    sleep: immediateSleep,
  });
  const service = new MonitorCycleService({
    source,
    store,
    dispatcher,
    logger,
    operatorAlerts,
    toggles: options.toggles,
    now: () => T1,
  });
  return { source, store, notifier, operatorAlerts, service };
};

const captureAbort = async (promise: Promise<unknown>): Promise<CycleAbortedError> => {
  try {
    await promise;
  } catch (error) {
    if (error instanceof CycleAbortedError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected the cycle to abort.");
};

describe("MonitorCycleService", () => {
  it("commits a baseline without alerting", async () => {
    const { store, notifier, service } = createHarness([buildSnapshot("GB", ["X", "Y"], T1)]);
    const states: MarketCycleState[] = [];

    const report = await service.runCycle("gb", { onStateChange: (state) => states.push(state) });

    expect(report.outcome).toBe("BASELINE");
    expect(report.changes).toEqual([]);
    expect(report.committed).toBe(true);
    expect(Array.from(store.snapshots.get("GB")?.programmes ?? [])).toEqual(["X", "Y"]);
    expect(notifier.sent).toEqual([]);
    expect(states).toEqual(["FETCHING", "DIFFING", "COMMITTING", "IDLE"]);
  });

  it("dispatches changes before committing the new snapshot", async () => {
    const { store, notifier, service } = createHarness([buildSnapshot("GB", ["B", "C", "D"], T1)]);
    store.snapshots.set("GB", buildSnapshot("GB", ["A", "B", "C"], T0));
    const states: MarketCycleState[] = [];

    const report = await service.runCycle("GB", { onStateChange: (state) => states.push(state) });

    expect(report.outcome).toBe("COMPLETED");
    expect(report.changes.map((change) => `${change.kind}:${change.programmeId}`)).toEqual([
      "DISAPPEARED:A",
      "APPEARED:D",
    ]);
    expect(report.deliveries.map((record) => record.status)).toEqual(["DELIVERED", "DELIVERED"]);
    expect(notifier.sent.map((message) => message.subject)).toEqual([
      "[AWIN] Programme removed: A",
      "[AWIN] New programme: D",
    ]);
    expect(states).toEqual(["FETCHING", "DIFFING", "DISPATCHING", "COMMITTING", "IDLE"]);
    expect(Array.from(store.snapshots.get("GB")?.programmes ?? [])).toEqual(["B", "C", "D"]);
  });

  it("skips the commit when nothing changed", async () => {
    const { store, service } = createHarness([buildSnapshot("GB", ["1", "2"], T1)]);
    store.snapshots.set("GB", buildSnapshot("GB", ["1", "2"], T0));
    const states: MarketCycleState[] = [];

    const report = await service.runCycle("GB", { onStateChange: (state) => states.push(state) });

    expect(report.outcome).toBe("UNCHANGED");
    expect(report.committed).toBe(false);
    expect(store.commitCount).toBe(0);
    expect(store.snapshots.get("GB")?.observedAt).toEqual(T0);
    expect(states).toEqual(["FETCHING", "DIFFING", "IDLE"]);
  });

  it("commits detail-only changes without alerting", async () => {
    const { store, notifier, service } = createHarness([
      buildSnapshot("GB", ["1"], T1, { "1": { status: "paused" } }),
    ]);
    store.snapshots.set("GB", buildSnapshot("GB", ["1"], T0, { "1": { status: "active" } }));

    const report = await service.runCycle("GB");

    expect(report.outcome).toBe("COMPLETED");
    expect(report.changes).toEqual([]);
    expect(report.committed).toBe(true);
    expect(notifier.sent).toEqual([]);
    expect(store.snapshots.get("GB")?.details.get("1")?.status).toBe("paused");
  });

  it("alerts when a listed programme moves to a closed status", async () => {
    const { store, notifier, service } = createHarness([
      buildSnapshot("GB", ["1", "2"], T1, { "1": { name: "Shop One", status: "closed", relationship: "joined" } }),
    ]);
    store.snapshots.set(
      "GB",
      buildSnapshot("GB", ["1", "2"], T0, { "1": { name: "Shop One", status: "active", relationship: "joined" } }),
    );
    const states: MarketCycleState[] = [];

    const report = await service.runCycle("GB", { onStateChange: (state) => states.push(state) });

    expect(report.outcome).toBe("COMPLETED");
    expect(report.changes.map((change) => `${change.kind}:${change.programmeId}`)).toEqual(["CLOSING:1"]);
    expect(report.deliveries.map((record) => record.status)).toEqual(["DELIVERED"]);
    expect(notifier.sent.map((message) => message.subject)).toEqual(["[AWIN] Programme closing: Shop One → closed/joined"]);
    expect(states).toEqual(["FETCHING", "DIFFING", "DISPATCHING", "COMMITTING", "IDLE"]);
    expect(store.snapshots.get("GB")?.details.get("1")?.status).toBe("closed");
  });

  it("reconciles closures silently when closing alerts are off", async () => {
    const { store, notifier, service } = createHarness(
      [buildSnapshot("GB", ["1"], T1, { "1": { relationship: "rejected" } })],
      { toggles: { alertOnClosed: false } },
    );
    store.snapshots.set("GB", buildSnapshot("GB", ["1"], T0, { "1": { relationship: "joined" } }));

    const report = await service.runCycle("GB");

    expect(report.changes.map((change) => change.kind)).toEqual(["CLOSING"]);
    expect(report.deliveries).toEqual([]);
    expect(notifier.attempts).toEqual([]);
    expect(store.snapshots.get("GB")?.details.get("1")?.relationship).toBe("rejected");
  });

  it("commits a degraded cycle and reports failed deliveries to the operator", async () => {
    const notifier = new RecordingNotifier({ "New programme: D": 99 });
    const { store, operatorAlerts, service } = createHarness([buildSnapshot("GB", ["A", "D"], T1)], { notifier });
    store.snapshots.set("GB", buildSnapshot("GB", ["A"], T0));

    const report = await service.runCycle("GB");

    expect(report.outcome).toBe("DEGRADED");
    expect(report.committed).toBe(true);
    expect(report.deliveries[0]?.status).toBe("FAILED");
    expect(report.deliveries[0]?.attempts).toBe(5);
    expect(operatorAlerts.notifyDeliveryFailures).toHaveBeenCalledWith("GB", report.deliveries);

    const next = await service.runCycle("GB");
    expect(next.outcome).toBe("UNCHANGED");
    expect(notifier.attempts).toHaveLength(5);
  });

  it("re-dispatches the same changes when the commit fails", async () => {
    const { store, notifier, service } = createHarness([buildSnapshot("GB", ["B", "C", "D"], T1)]);
    store.snapshots.set("GB", buildSnapshot("GB", ["A", "B", "C"], T0));
    store.failCommits = 1;

    const aborted = await captureAbort(service.runCycle("GB"));
    expect(aborted.state).toBe("COMMITTING");
    expect(aborted.message).toBe("Cycle for market 'GB' aborted while COMMITTING: commit failed for GB");
    expect(Array.from(store.snapshots.get("GB")?.programmes ?? [])).toEqual(["A", "B", "C"]);
    expect(notifier.sent).toHaveLength(2);

    const retry = await service.runCycle("GB");
    expect(retry.outcome).toBe("COMPLETED");
    expect(retry.changes.map((change) => change.programmeId)).toEqual(["A", "D"]);
    expect(notifier.sent.map((message) => message.subject)).toEqual([
      "[AWIN] Programme removed: A",
      "[AWIN] New programme: D",
      "[AWIN] Programme removed: A",
      "[AWIN] New programme: D",
    ]);
    expect(Array.from(store.snapshots.get("GB")?.programmes ?? [])).toEqual(["B", "C", "D"]);
  });

  it("aborts while fetching and raises an operator alert for permanent upstream errors", async () => {
    const upstream = new UpstreamError("permanent", "AWIN programmes request failed with status 401", {
      statusCode: 401,
    });
    const { store, operatorAlerts, service } = createHarness([upstream]);

    const aborted = await captureAbort(service.runCycle("GB"));

    expect(aborted.state).toBe("FETCHING");
    expect(aborted.cause).toBe(upstream);
    expect(operatorAlerts.notifyUpstreamFailure).toHaveBeenCalledWith("GB", upstream);
    expect(store.commitCount).toBe(0);
  });

  it("does not raise operator alerts for transient upstream errors", async () => {
    const { operatorAlerts, service } = createHarness([new UpstreamError("transient", "timed out")]);

    await captureAbort(service.runCycle("GB"));

    expect(operatorAlerts.notifyUpstreamFailure).not.toHaveBeenCalled();
  });

  it("reports a permanent upstream error even when loading also fails", async () => {
    const upstream = new UpstreamError("permanent", "AWIN programmes request failed with status 403", {
      statusCode: 403,
    });
    const { source, store, operatorAlerts, service } = createHarness([upstream]);
    vi.spyOn(source, "fetchActive").mockImplementation(
      () =>
        new Promise((_resolve, reject) => {
          setTimeout(() => reject(upstream), 5);
        }),
    );
    store.failLoads = 1;

    const aborted = await captureAbort(service.runCycle("GB"));

    expect(aborted.state).toBe("FETCHING");
    expect(aborted.cause).toBe(upstream);
    expect(operatorAlerts.notifyUpstreamFailure).toHaveBeenCalledWith("GB", upstream);
  });

  it("aborts when the previous snapshot cannot be loaded", async () => {
    const { store, service } = createHarness([buildSnapshot("GB", ["1"], T1)]);
    store.failLoads = 1;

    const aborted = await captureAbort(service.runCycle("GB"));

    expect(aborted.state).toBe("FETCHING");
    expect(store.commitCount).toBe(0);
  });

  it("suppresses toggled-off changes but still reconciles them", async () => {
    const { store, notifier, service } = createHarness([buildSnapshot("GB", ["B"], T1)], {
      toggles: { alertOnRemoved: false },
    });
    store.snapshots.set("GB", buildSnapshot("GB", ["A"], T0));

    const report = await service.runCycle("GB");

    expect(report.changes).toHaveLength(2);
    expect(report.deliveries.map((record) => record.change.programmeId)).toEqual(["B"]);
    expect(notifier.sent.map((message) => message.subject)).toEqual(["[AWIN] New programme: B"]);
    expect(Array.from(store.snapshots.get("GB")?.programmes ?? [])).toEqual(["B"]);
  });

  it("commits without dispatching when alerts are disabled", async () => {
    const { store, notifier, service } = createHarness([buildSnapshot("GB", ["B"], T1)], {
      toggles: { alertsEnabled: false },
    });
    store.snapshots.set("GB", buildSnapshot("GB", ["A"], T0));
    const states: MarketCycleState[] = [];

    const report = await service.runCycle("GB", { onStateChange: (state) => states.push(state) });

    expect(report.deliveries).toEqual([]);
    expect(notifier.attempts).toEqual([]);
    expect(states).toEqual(["FETCHING", "DIFFING", "COMMITTING", "IDLE"]);
  });

  it("aborts without committing when dispatch is cancelled", async () => {
    const { store, service } = createHarness([buildSnapshot("GB", ["B"], T1)]);
    store.snapshots.set("GB", buildSnapshot("GB", ["A"], T0));
    const controller = new AbortController();
    controller.abort();

    const aborted = await captureAbort(service.runCycle("GB", { signal: controller.signal }));

    expect(aborted.state).toBe("DISPATCHING");
    expect(aborted.cause).toBeInstanceOf(DispatchCancelledError);
    expect(store.commitCount).toBe(0);
  });

  it("refuses to commit after a forced shutdown", async () => {
    const { store, service } = createHarness([buildSnapshot("GB", ["1"], T1)]);
    const force = new AbortController();
    force.abort();
    const states: MarketCycleState[] = [];

    const aborted = await captureAbort(
      service.runCycle("GB", { forceSignal: force.signal, onStateChange: (state) => states.push(state) }),
    );

    expect(aborted.cause).toBeInstanceOf(ShutdownForcedError);
    expect(states).toEqual(["FETCHING", "DIFFING", "COMMITTING", "ABORTED"]);
    expect(store.commitCount).toBe(0);
  });
});
