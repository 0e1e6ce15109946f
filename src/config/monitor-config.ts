import path from "node:path";
import { z } from "zod";
import type { SmtpSettings } from "../programme-monitor/providers/smtp-notifier.js";

export class MonitorConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MonitorConfigError";
  }
}

export type MonitorConfig = {
  markets: string[];
  pollIntervalMs: number;
  runOnStart: boolean;
  shutdownGraceMs: number;
  storagePath: string;
  delivery: {
    maxAttempts: number;
    backoffBaseMs: number;
    backoffFactor: number;
    backoffMaxMs: number;
  };
  alerts: {
    enabled: boolean;
    onNew: boolean;
    onRemoved: boolean;
    onClosed: boolean;
    onFeedFailure: boolean;
    to: string[];
    from: string | null;
    subjectPrefix: string;
    operatorTo: string[];
    cooldownMs: number;
  };
  smtp: SmtpSettings;
  awin: {
    apiBaseUrl: string;
    publisherId: string | null;
    token: string | null;
    timeoutMs: number;
  };
};

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)\s*(ms|s|m|h)?$/i;

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

const emailSchema = z.string().email();

const normalizeOptionalString = (value: string | null | undefined): string | null => {
  if (value === null || value === undefined) {
    return null;
  }
  const normalized = value.trim();
  return normalized.length > 0 ? normalized : null;
};

/** Parses `250ms`, `30s`, `15m`, `3h` or a bare millisecond count. */
export const parseDuration = (value: string): number | null => {
  const match = DURATION_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const amount = Number(match[1]);
  const unit = (match[2] ?? "ms").toLowerCase();
  const factor = UNIT_MS[unit];
  if (factor === undefined || !Number.isFinite(amount)) {
    return null;
  }
  return Math.round(amount * factor);
};

const readDuration = (
  env: NodeJS.ProcessEnv,
  name: string,
  fallbackMs: number,
  options: { allowZero?: boolean } = {},
): number => {
  const raw = normalizeOptionalString(env[name]);
  if (!raw) {
    return fallbackMs;
  }
  const parsed = parseDuration(raw);
  if (parsed === null || parsed < 0 || (parsed === 0 && !options.allowZero)) {
    throw new MonitorConfigError(`${name} must be a ${options.allowZero ? "non-negative" : "positive"} duration. Received: ${raw}`);
  }
  return parsed;
};

const readBoolean = (env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean => {
  const normalized = normalizeOptionalString(env[name])?.toLowerCase();
  if (!normalized) {
    return fallback;
  }
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }
  throw new MonitorConfigError(`${name} must be a boolean. Received: ${normalized}`);
};

const readNumber = (
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  validate: (value: number) => boolean,
  requirement: string,
): number => {
  const raw = normalizeOptionalString(env[name]);
  if (!raw) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || !validate(parsed)) {
    throw new MonitorConfigError(`${name} must be ${requirement}. Received: ${raw}`);
  }
  return parsed;
};

const readList = (value: string | null | undefined): string[] => {
  const normalized = normalizeOptionalString(value);
  if (!normalized) {
    return [];
  }
  return normalized
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
};

const readEmailList = (env: NodeJS.ProcessEnv, name: string): string[] => {
  const addresses = readList(env[name]);
  for (const address of addresses) {
    if (!emailSchema.safeParse(address).success) {
      throw new MonitorConfigError(`${name} contains an invalid email address: ${address}`);
    }
  }
  return addresses;
};

const readMarkets = (env: NodeJS.ProcessEnv): string[] => {
  const raw = normalizeOptionalString(env.MONITOR_MARKETS) ?? normalizeOptionalString(env.AWIN_COUNTRY);
  const markets = Array.from(new Set(readList(raw).map((market) => market.toUpperCase())));
  if (markets.length === 0) {
    throw new MonitorConfigError("MONITOR_MARKETS (or AWIN_COUNTRY) must list at least one market.");
  }
  return markets;
};

const readApiBaseUrl = (env: NodeJS.ProcessEnv): string => {
  const raw = normalizeOptionalString(env.AWIN_API_BASE) ?? "https://api.awin.com";
  try {
    const url = new URL(raw);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      throw new Error(`unsupported protocol ${url.protocol}`);
    }
  } catch (error) {
    throw new MonitorConfigError(`AWIN_API_BASE must be an http(s) URL. Received: ${raw} (${String(error)})`);
  }
  return raw.replace(/\/+$/, "");
};

/**
 * Builds the monitor configuration from environment variables. Only the
 * entry point passes `process.env`; everything else receives this object.
 */
export const getMonitorConfigFromEnv = (env: NodeJS.ProcessEnv, cwd: string = process.cwd()): MonitorConfig => {
  const backoffBaseMs = readDuration(env, "ALERT_BACKOFF_BASE", 2_000, { allowZero: true });
  const backoffMaxMs = readDuration(env, "ALERT_BACKOFF_MAX", 60_000, { allowZero: true });
  if (backoffMaxMs < backoffBaseMs) {
    throw new MonitorConfigError("ALERT_BACKOFF_MAX must not be smaller than ALERT_BACKOFF_BASE.");
  }

  const explicitFrom = normalizeOptionalString(env.ALERT_FROM);
  if (explicitFrom && !emailSchema.safeParse(explicitFrom).success) {
    throw new MonitorConfigError(`ALERT_FROM must be an email address. Received: ${explicitFrom}`);
  }
  // The SMTP login doubles as sender only when it is an address.
  const smtpUser = normalizeOptionalString(env.SMTP_USER);
  const alertFrom = explicitFrom ?? (smtpUser && emailSchema.safeParse(smtpUser).success ? smtpUser : null);

  return {
    markets: readMarkets(env),
    pollIntervalMs: readDuration(env, "MONITOR_POLL_INTERVAL", 3 * 3_600_000),
    runOnStart: readBoolean(env, "MONITOR_RUN_ON_START", true),
    shutdownGraceMs: readDuration(env, "MONITOR_SHUTDOWN_GRACE", 30_000, { allowZero: true }),
    storagePath: path.resolve(cwd, normalizeOptionalString(env.MONITOR_STORAGE_PATH) ?? "./data"),
    delivery: {
      maxAttempts: readNumber(
        env,
        "ALERT_MAX_ATTEMPTS",
        5,
        (value) => Number.isInteger(value) && value >= 1,
        "a positive integer",
      ),
      backoffBaseMs,
      backoffFactor: readNumber(env, "ALERT_BACKOFF_FACTOR", 2, (value) => value >= 1, "a number >= 1"),
      backoffMaxMs,
    },
    alerts: {
      enabled: readBoolean(env, "ALERTS_ENABLED", true),
      onNew: readBoolean(env, "ALERT_ON_NEW", true),
      onRemoved: readBoolean(env, "ALERT_ON_REMOVED", true),
      onClosed: readBoolean(env, "ALERT_ON_CLOSED", true),
      onFeedFailure: readBoolean(env, "ALERT_ON_FEED_FAILURE", true),
      to: readEmailList(env, "ALERT_TO"),
      from: alertFrom,
      subjectPrefix: env.ALERT_SUBJECT_PREFIX?.trim() ?? "[AWIN]",
      operatorTo: readEmailList(env, "OPERATOR_ALERT_TO"),
      cooldownMs:
        readNumber(env, "ALERT_COOLDOWN_MIN", 60, (value) => value >= 0, "a non-negative number of minutes") *
        60_000,
    },
    smtp: {
      host: normalizeOptionalString(env.SMTP_HOST),
      port: readNumber(
        env,
        "SMTP_PORT",
        587,
        (value) => Number.isInteger(value) && value > 0 && value < 65_536,
        "a TCP port",
      ),
      user: normalizeOptionalString(env.SMTP_USER),
      pass: normalizeOptionalString(env.SMTP_PASS),
      secure: readBoolean(env, "SMTP_SECURE", false),
    },
    awin: {
      apiBaseUrl: readApiBaseUrl(env),
      publisherId: normalizeOptionalString(env.AWIN_PUBLISHER_ID),
      token: normalizeOptionalString(env.AWIN_TOKEN),
      timeoutMs: readDuration(env, "AWIN_TIMEOUT", 30_000),
    },
  };
};
