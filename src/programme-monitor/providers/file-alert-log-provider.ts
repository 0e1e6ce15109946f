import path from "node:path";
import type { AlertLogEntry, AlertLogEvent, AlertLogProvider } from "./alert-log-provider.js";
import {
  appendJsonlFile,
  normalizeNullableString,
  parseDate,
  readJsonlLines,
} from "../../persistence/file/store-utils.js";

const MAX_INFO_LENGTH = 500;

const ALERT_LOG_EVENTS: readonly AlertLogEvent[] = ["new", "removed", "closed", "upstream_failure", "delivery_failure"];

const isAlertLogEvent = (value: unknown): value is AlertLogEvent =>
  ALERT_LOG_EVENTS.some((event) => event === value);

const asNullableString = (value: unknown): string | null =>
  typeof value === "string" ? normalizeNullableString(value) : null;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

// A torn line from an interrupted append parses to null and is skipped.
const parseLine = (line: string): unknown => {
  try {
    return JSON.parse(line) as unknown;
  } catch {
    return null;
  }
};

const toDomain = (row: unknown): AlertLogEntry | null => {
  if (!isRecord(row) || !isAlertLogEvent(row.event)) {
    return null;
  }
  const ts = typeof row.ts === "string" ? parseDate(row.ts) : null;
  const marketKey = asNullableString(row.marketKey);
  if (!ts || !marketKey) {
    return null;
  }
  return {
    ts: ts.toISOString(),
    event: row.event,
    marketKey,
    programmeId: asNullableString(row.programmeId),
    name: asNullableString(row.name),
    details: typeof row.details === "string" ? row.details : "",
    emailSent: row.emailSent === true,
    emailInfo: typeof row.emailInfo === "string" ? row.emailInfo : "",
  };
};

/** Append-only JSONL log of alert outcomes. */
export class FileAlertLogProvider implements AlertLogProvider {
  readonly filePath: string;

  constructor(rootDir: string) {
    this.filePath = path.join(path.resolve(rootDir), "alert-log.jsonl");
  }

  async append(entry: AlertLogEntry): Promise<void> {
    await appendJsonlFile(this.filePath, {
      ...entry,
      emailInfo: entry.emailInfo.slice(0, MAX_INFO_LENGTH),
    });
  }

  async listRecent(limit: number): Promise<AlertLogEntry[]> {
    const lines = await readJsonlLines(this.filePath);
    const entries: AlertLogEntry[] = [];
    for (const line of lines) {
      const entry = toDomain(parseLine(line));
      if (entry) {
        entries.push(entry);
      }
    }
    return entries.reverse().slice(0, Math.max(0, Math.floor(limit)));
  }
}
