import {
  compareProgrammeIds,
  type Change,
  type ChangeKind,
  type ProgrammeDetails,
  type ProgrammeSnapshot,
} from "../domain/models.js";

const KIND_ORDER: Record<ChangeKind, number> = {
  DISAPPEARED: 0,
  APPEARED: 1,
  CLOSING: 2,
};

const CLOSED_STATUSES: ReadonlySet<string> = new Set(["closed", "deactivated", "suspended"]);
const CLOSED_RELATIONSHIPS: ReadonlySet<string> = new Set(["rejected", "suspended"]);

export const compareChanges = (left: Change, right: Change): number => {
  const byId = compareProgrammeIds(left.programmeId, right.programmeId);
  if (byId !== 0) {
    return byId;
  }
  return KIND_ORDER[left.kind] - KIND_ORDER[right.kind];
};

const toChange = (
  kind: ChangeKind,
  programmeId: string,
  current: ProgrammeSnapshot,
  source: ProgrammeSnapshot,
): Change => ({
  programmeId,
  kind,
  marketKey: current.marketKey,
  detectedAt: current.observedAt,
  details: source.details.get(programmeId) ?? null,
});

/**
 * Classifies the programmes that appeared in or disappeared from `current`
 * relative to `previous`. A missing `previous` is a baseline and yields no
 * changes. Output is sorted by programme id, DISAPPEARED first on a tie.
 */
export const diff = (previous: ProgrammeSnapshot | null, current: ProgrammeSnapshot): Change[] => {
  if (!previous) {
    return [];
  }
  if (previous.marketKey !== current.marketKey) {
    throw new Error(
      `Cannot diff snapshots of different markets ('${previous.marketKey}' vs '${current.marketKey}').`,
    );
  }

  const changes: Change[] = [];
  for (const programmeId of current.programmes) {
    if (!previous.programmes.has(programmeId)) {
      changes.push(toChange("APPEARED", programmeId, current, current));
    }
  }
  for (const programmeId of previous.programmes) {
    if (!current.programmes.has(programmeId)) {
      changes.push(toChange("DISAPPEARED", programmeId, current, previous));
    }
  }

  return changes.sort(compareChanges);
};

export const isClosingDetails = (details: ProgrammeDetails): boolean =>
  CLOSED_STATUSES.has((details.status ?? "").toLowerCase()) ||
  CLOSED_RELATIONSHIPS.has((details.relationship ?? "").toLowerCase());

const sameStanding = (left: ProgrammeDetails | undefined, right: ProgrammeDetails | undefined): boolean =>
  (left?.status ?? null) === (right?.status ?? null) &&
  (left?.relationship ?? null) === (right?.relationship ?? null);

/**
 * Programmes listed in both snapshots whose status or relationship changed
 * into a closed value. A missing `previous` yields nothing.
 */
export const detectClosures = (previous: ProgrammeSnapshot | null, current: ProgrammeSnapshot): Change[] => {
  if (!previous || previous.marketKey !== current.marketKey) {
    return [];
  }
  const closures: Change[] = [];
  for (const programmeId of current.programmes) {
    const before = previous.details.get(programmeId);
    const after = current.details.get(programmeId);
    if (!previous.programmes.has(programmeId) || !after || sameStanding(before, after) || !isClosingDetails(after)) {
      continue;
    }
    closures.push({
      programmeId,
      kind: "CLOSING",
      marketKey: current.marketKey,
      detectedAt: current.observedAt,
      details: after,
      previousDetails: before ?? null,
    });
  }
  return closures.sort(compareChanges);
};

/** Membership changes from `diff` plus closures, in change order. */
export const detectChanges = (previous: ProgrammeSnapshot | null, current: ProgrammeSnapshot): Change[] =>
  [...diff(previous, current), ...detectClosures(previous, current)].sort(compareChanges);

const sameDetails = (left: ProgrammeDetails | undefined, right: ProgrammeDetails | undefined): boolean =>
  (left?.name ?? null) === (right?.name ?? null) &&
  (left?.status ?? null) === (right?.status ?? null) &&
  (left?.relationship ?? null) === (right?.relationship ?? null);

export const hasSameContent = (previous: ProgrammeSnapshot, current: ProgrammeSnapshot): boolean => {
  if (previous.marketKey !== current.marketKey) {
    return false;
  }
  if (previous.programmes.size !== current.programmes.size) {
    return false;
  }
  for (const programmeId of current.programmes) {
    if (!previous.programmes.has(programmeId)) {
      return false;
    }
    if (!sameDetails(previous.details.get(programmeId), current.details.get(programmeId))) {
      return false;
    }
  }
  return true;
};
