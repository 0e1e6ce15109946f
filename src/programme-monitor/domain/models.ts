export type ProgrammeId = string;

export type ProgrammeDetails = {
  name: string | null;
  status: string | null;
  relationship: string | null;
};

export type ProgrammeSnapshot = Readonly<{
  marketKey: string;
  observedAt: Date;
  programmes: ReadonlySet<ProgrammeId>;
  details: ReadonlyMap<ProgrammeId, ProgrammeDetails>;
}>;

/** CLOSING: a programme still listed whose status or relationship moved to a closed value. */
export type ChangeKind = "APPEARED" | "DISAPPEARED" | "CLOSING";

export type Change = Readonly<{
  programmeId: ProgrammeId;
  kind: ChangeKind;
  marketKey: string;
  detectedAt: Date;
  details: ProgrammeDetails | null;
  previousDetails?: ProgrammeDetails | null;
}>;

export type DeliveryStatus = "PENDING" | "DELIVERED" | "FAILED";

export type DeliveryRecord = {
  change: Change;
  attempts: number;
  lastAttemptAt: Date | null;
  status: DeliveryStatus;
  lastError: string | null;
};

export type MarketCycleState =
  | "IDLE"
  | "FETCHING"
  | "DIFFING"
  | "DISPATCHING"
  | "COMMITTING"
  | "ABORTED";

export type CycleOutcome = "BASELINE" | "UNCHANGED" | "COMPLETED" | "DEGRADED";

export type CycleReport = {
  marketKey: string;
  outcome: CycleOutcome;
  changes: Change[];
  deliveries: DeliveryRecord[];
  committed: boolean;
  startedAt: Date;
  finishedAt: Date;
};

export type MarketRunResult =
  | { status: "completed"; report: CycleReport }
  | { status: "aborted"; error: string };

export type CreateSnapshotInput = {
  marketKey: string;
  observedAt: Date;
  programmes: Iterable<{ programmeId: ProgrammeId; details?: Partial<ProgrammeDetails> | null }>;
};

const EMPTY_DETAILS: ProgrammeDetails = { name: null, status: null, relationship: null };

const normalizeNullableString = (value: string | null | undefined): string | null => {
  if (value === null || value === undefined) {
    return null;
  }
  const normalized = value.trim();
  return normalized.length > 0 ? normalized : null;
};

export const normalizeMarketKey = (value: string): string => {
  const normalized = value.trim().toUpperCase();
  if (normalized.length === 0) {
    throw new Error("marketKey must be a non-empty string.");
  }
  return normalized;
};

export const normalizeProgrammeId = (value: string | number): ProgrammeId => {
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new Error(`Programme id must be a safe integer. Received: ${value}`);
    }
    return String(value);
  }
  const normalized = value.trim();
  if (normalized.length === 0) {
    throw new Error("Programme id must be a non-empty string.");
  }
  return normalized;
};

export const normalizeProgrammeDetails = (
  details: Partial<ProgrammeDetails> | null | undefined,
): ProgrammeDetails => {
  if (!details) {
    return EMPTY_DETAILS;
  }
  return {
    name: normalizeNullableString(details.name),
    status: normalizeNullableString(details.status),
    relationship: normalizeNullableString(details.relationship),
  };
};

/**
 * Builds a frozen snapshot. A programme listed twice keeps the details of its
 * first occurrence.
 */
export const createProgrammeSnapshot = (input: CreateSnapshotInput): ProgrammeSnapshot => {
  const programmes = new Set<ProgrammeId>();
  const details = new Map<ProgrammeId, ProgrammeDetails>();

  for (const entry of input.programmes) {
    const programmeId = normalizeProgrammeId(entry.programmeId);
    if (programmes.has(programmeId)) {
      continue;
    }
    programmes.add(programmeId);
    details.set(programmeId, normalizeProgrammeDetails(entry.details));
  }

  return Object.freeze({
    marketKey: normalizeMarketKey(input.marketKey),
    observedAt: new Date(input.observedAt.getTime()),
    programmes,
    details,
  });
};

const DIGITS_ONLY = /^\d+$/;

/**
 * Total order over programme ids: all-digit ids compare numerically and sort
 * before any other id; other ids compare by code unit.
 */
export const compareProgrammeIds = (left: ProgrammeId, right: ProgrammeId): number => {
  const leftNumeric = DIGITS_ONLY.test(left);
  const rightNumeric = DIGITS_ONLY.test(right);

  if (leftNumeric && rightNumeric) {
    const leftTrimmed = left.replace(/^0+(?=\d)/, "");
    const rightTrimmed = right.replace(/^0+(?=\d)/, "");
    if (leftTrimmed.length !== rightTrimmed.length) {
      return leftTrimmed.length - rightTrimmed.length;
    }
    if (leftTrimmed !== rightTrimmed) {
      return leftTrimmed < rightTrimmed ? -1 : 1;
    }
  } else if (leftNumeric !== rightNumeric) {
    return leftNumeric ? -1 : 1;
  }

  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
};

export const sortedProgrammeIds = (programmes: Iterable<ProgrammeId>): ProgrammeId[] =>
  Array.from(programmes).sort(compareProgrammeIds);
