import type { ProgrammeSnapshot } from "../domain/models.js";

export interface SnapshotStore {
  /** Last committed snapshot for the market, or `null` before the first commit. */
  load(marketKey: string): Promise<ProgrammeSnapshot | null>;
  commit(marketKey: string, snapshot: ProgrammeSnapshot): Promise<void>;
}
