import { StorageError } from "../../src/programme-monitor/domain/errors.js";
import {
  createProgrammeSnapshot,
  type ProgrammeDetails,
  type ProgrammeSnapshot,
} from "../../src/programme-monitor/domain/models.js";
import type { AlertLogEntry, AlertLogProvider } from "../../src/programme-monitor/providers/alert-log-provider.js";
import type { Notifier, NotifyOutcome } from "../../src/programme-monitor/providers/notifier.js";
import type { ProgrammeSource } from "../../src/programme-monitor/providers/programme-source.js";
import type { SnapshotStore } from "../../src/programme-monitor/providers/snapshot-store.js";

export const T0 = new Date("2026-03-01T09:00:00.000Z");

export const buildSnapshot = (
  marketKey: string,
  programmeIds: readonly string[],
  observedAt: Date = T0,
  details: Record<string, Partial<ProgrammeDetails>> = {},
): ProgrammeSnapshot =>
  createProgrammeSnapshot({
    marketKey,
    observedAt,
    programmes: programmeIds.map((programmeId) => ({ programmeId, details: details[programmeId] ?? null })),
  });

/** Returns queued snapshots or errors in order; repeats the last entry when the queue runs dry. */
export class ScriptedProgrammeSource implements ProgrammeSource {
  readonly calls: string[] = [];
  private readonly script: Array<ProgrammeSnapshot | Error>;

  constructor(script: Array<ProgrammeSnapshot | Error>) {
    this.script = [...script];
  }

  async fetchActive(marketKey: string): Promise<ProgrammeSnapshot> {
    this.calls.push(marketKey);
    const next = this.script.length > 1 ? this.script.shift() : this.script[0];
    if (next === undefined) {
      throw new Error("ScriptedProgrammeSource has no entries.");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export class InMemorySnapshotStore implements SnapshotStore {
  readonly snapshots = new Map<string, ProgrammeSnapshot>();
  commitCount = 0;
  failCommits = 0;
  failLoads = 0;

  async load(marketKey: string): Promise<ProgrammeSnapshot | null> {
    if (this.failLoads > 0) {
      this.failLoads -= 1;
      throw new StorageError(`load failed for ${marketKey}`, { marketKey });
    }
    return this.snapshots.get(marketKey) ?? null;
  }

  async commit(marketKey: string, snapshot: ProgrammeSnapshot): Promise<void> {
    if (this.failCommits > 0) {
      this.failCommits -= 1;
      throw new StorageError(`commit failed for ${marketKey}`, { marketKey });
    }
    this.commitCount += 1;
    this.snapshots.set(marketKey, snapshot);
  }
}

export type SentMessage = { recipients: string[]; subject: string; body: string };

/**
 * Records every send. `failures` maps a subject fragment to the number of
 * consecutive sends that should fail for subjects containing it.
 */
export class RecordingNotifier implements Notifier {
  readonly sent: SentMessage[] = [];
  readonly attempts: string[] = [];
  private readonly failures: Map<string, number>;

  constructor(failures: Record<string, number> = {}) {
    this.failures = new Map(Object.entries(failures));
  }

  async send(recipients: readonly string[], subject: string, body: string): Promise<NotifyOutcome> {
    this.attempts.push(subject);
    for (const [fragment, remaining] of this.failures) {
      if (remaining > 0 && subject.includes(fragment)) {
        this.failures.set(fragment, remaining - 1);
        throw new Error(`smtp unavailable for ${fragment}`);
      }
    }
    this.sent.push({ recipients: [...recipients], subject, body });
    return { emailed: true, info: "sent" };
  }
}

export class InMemoryAlertLog implements AlertLogProvider {
  readonly entries: AlertLogEntry[] = [];

  async append(entry: AlertLogEntry): Promise<void> {
    this.entries.push(entry);
  }

  async listRecent(limit: number): Promise<AlertLogEntry[]> {
    return [...this.entries].reverse().slice(0, limit);
  }
}

export const immediateSleep = async (): Promise<void> => undefined;
