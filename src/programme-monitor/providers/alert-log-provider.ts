export type AlertLogEvent = "new" | "removed" | "closed" | "upstream_failure" | "delivery_failure";

export type AlertLogEntry = {
  ts: string;
  event: AlertLogEvent;
  marketKey: string;
  programmeId: string | null;
  name: string | null;
  details: string;
  emailSent: boolean;
  emailInfo: string;
};

export interface AlertLogProvider {
  append(entry: AlertLogEntry): Promise<void>;
  listRecent(limit: number): Promise<AlertLogEntry[]>;
}
