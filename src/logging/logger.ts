import pino, { type Logger } from "pino";
import type { PinoLogLevel } from "../config/logging-config.js";

export type { Logger };

export const createLogger = (level: PinoLogLevel, bindings: Record<string, string> = {}): Logger =>
  pino({
    level,
    base: { service: "programme-monitor", ...bindings },
    timestamp: pino.stdTimeFunctions.isoTime,
  });

/** Discards everything; used by tests and by callers without a logger. */
export const createSilentLogger = (): Logger => pino({ level: "silent" });
