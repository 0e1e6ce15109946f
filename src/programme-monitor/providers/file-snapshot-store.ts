import path from "node:path";
import { z } from "zod";
import { StorageError } from "../domain/errors.js";
import {
  createProgrammeSnapshot,
  normalizeMarketKey,
  sortedProgrammeIds,
  type ProgrammeDetails,
  type ProgrammeSnapshot,
} from "../domain/models.js";
import type { SnapshotStore } from "./snapshot-store.js";
import { readJsonFile, writeJsonFileAtomic } from "../../persistence/file/store-utils.js";

const SNAPSHOT_FORMAT_VERSION = 1;

const persistedDetailsSchema = z.object({
  name: z.string().nullable(),
  status: z.string().nullable(),
  relationship: z.string().nullable(),
});

const persistedSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_FORMAT_VERSION),
  marketKey: z.string().min(1),
  observedAt: z.string().datetime(),
  programmes: z.array(z.string().min(1)),
  details: z.record(persistedDetailsSchema),
});

export type PersistedSnapshotRecord = z.infer<typeof persistedSnapshotSchema>;

export const toPersistedRecord = (snapshot: ProgrammeSnapshot): PersistedSnapshotRecord => {
  const programmes = sortedProgrammeIds(snapshot.programmes);
  const details: Record<string, ProgrammeDetails> = {};
  for (const programmeId of programmes) {
    const entry = snapshot.details.get(programmeId);
    details[programmeId] = {
      name: entry?.name ?? null,
      status: entry?.status ?? null,
      relationship: entry?.relationship ?? null,
    };
  }
  return {
    version: SNAPSHOT_FORMAT_VERSION,
    marketKey: snapshot.marketKey,
    observedAt: snapshot.observedAt.toISOString(),
    programmes,
    details,
  };
};

const fromPersistedRecord = (record: PersistedSnapshotRecord): ProgrammeSnapshot =>
  createProgrammeSnapshot({
    marketKey: record.marketKey,
    observedAt: new Date(record.observedAt),
    programmes: record.programmes.map((programmeId) => ({
      programmeId,
      details: record.details[programmeId] ?? null,
    })),
  });

/**
 * One JSON file per market under `rootDir`. Commits go through an atomic
 * temp-file rename and are serialized per file.
 */
export class FileSnapshotStore implements SnapshotStore {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    const normalized = rootDir.trim();
    if (normalized.length === 0) {
      throw new Error("Snapshot storage path must be a non-empty string.");
    }
    this.rootDir = path.resolve(normalized);
  }

  resolveSnapshotPath(marketKey: string): string {
    return path.join(this.rootDir, "snapshots", `${encodeURIComponent(normalizeMarketKey(marketKey))}.json`);
  }

  async load(marketKey: string): Promise<ProgrammeSnapshot | null> {
    const normalizedKey = normalizeMarketKey(marketKey);
    const filePath = this.resolveSnapshotPath(normalizedKey);

    let raw: unknown;
    try {
      raw = await readJsonFile(filePath);
    } catch (error) {
      throw new StorageError(`Failed to read snapshot for market '${normalizedKey}' from ${filePath}.`, {
        marketKey: normalizedKey,
        cause: error,
      });
    }
    if (raw === null) {
      return null;
    }

    const parsed = persistedSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StorageError(
        `Snapshot file ${filePath} is not a valid snapshot record: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
          .join("; ")}`,
        { marketKey: normalizedKey, cause: parsed.error },
      );
    }
    if (parsed.data.marketKey !== normalizedKey) {
      throw new StorageError(
        `Snapshot file ${filePath} belongs to market '${parsed.data.marketKey}', expected '${normalizedKey}'.`,
        { marketKey: normalizedKey },
      );
    }
    return fromPersistedRecord(parsed.data);
  }

  async commit(marketKey: string, snapshot: ProgrammeSnapshot): Promise<void> {
    const normalizedKey = normalizeMarketKey(marketKey);
    if (snapshot.marketKey !== normalizedKey) {
      throw new StorageError(
        `Refusing to commit a snapshot of market '${snapshot.marketKey}' under '${normalizedKey}'.`,
        { marketKey: normalizedKey },
      );
    }

    const filePath = this.resolveSnapshotPath(normalizedKey);
    try {
      await writeJsonFileAtomic(filePath, toPersistedRecord(snapshot));
    } catch (error) {
      throw new StorageError(`Failed to commit snapshot for market '${normalizedKey}' to ${filePath}.`, {
        marketKey: normalizedKey,
        cause: error,
      });
    }
  }
}
