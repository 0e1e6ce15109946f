import type { Change, ChangeKind } from "../domain/models.js";

export type AlertMessage = {
  subject: string;
  body: string;
};

export const DEFAULT_SUBJECT_PREFIX = "[AWIN]";

const displayValue = (value: string | null | undefined): string => value ?? "-";

const CHANGE_LABELS: Record<ChangeKind, string> = {
  APPEARED: "appeared",
  DISAPPEARED: "disappeared",
  CLOSING: "closing",
};

const formatHeadline = (change: Change): string => {
  const label = change.details?.name ?? change.programmeId;
  switch (change.kind) {
    case "APPEARED":
      return `New programme: ${label}`;
    case "DISAPPEARED":
      return `Programme removed: ${label}`;
    case "CLOSING":
      return `Programme closing: ${label} → ${displayValue(change.details?.status)}/${displayValue(change.details?.relationship)}`;
  }
};

export const formatChangeSubject = (change: Change, subjectPrefix = DEFAULT_SUBJECT_PREFIX): string => {
  const headline = formatHeadline(change);
  const prefix = subjectPrefix.trim();
  return prefix.length > 0 ? `${prefix} ${headline}` : headline;
};

export const formatChangeBody = (change: Change): string => {
  const lines = [
    `Market: ${change.marketKey}`,
    `Programme ID: ${change.programmeId}`,
    `Name: ${displayValue(change.details?.name)}`,
    `Status: ${displayValue(change.details?.status)}`,
    `Relationship: ${displayValue(change.details?.relationship)}`,
  ];
  if (change.kind === "CLOSING") {
    lines.push(
      `Previous: ${displayValue(change.previousDetails?.status)} / ${displayValue(change.previousDetails?.relationship)}`,
    );
  }
  lines.push(`Change: ${CHANGE_LABELS[change.kind]}`, `Detected at: ${change.detectedAt.toISOString()}`);
  return lines.join("\n");
};

export const formatChangeAlert = (change: Change, subjectPrefix = DEFAULT_SUBJECT_PREFIX): AlertMessage => ({
  subject: formatChangeSubject(change, subjectPrefix),
  body: formatChangeBody(change),
});
