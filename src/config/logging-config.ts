export type HttpAccessLogMode = "off" | "errors" | "all";

export type PinoLogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type LoggingConfig = {
  pinoLogLevel: PinoLogLevel;
  httpAccessLogMode: HttpAccessLogMode;
  includeNoisyHttpAccessRoutes: boolean;
};

const PINO_LOG_LEVELS: readonly PinoLogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];
const HTTP_ACCESS_LOG_MODES: readonly HttpAccessLogMode[] = ["off", "errors", "all"];

const normalizeLowercase = (value: string | undefined): string | null => {
  const normalized = value?.trim().toLowerCase();
  return normalized ? normalized : null;
};

// Unknown values fall back to the default.
const pickOption = <T extends string>(options: readonly T[], value: string | undefined, fallback: T): T => {
  const normalized = normalizeLowercase(value);
  return options.find((option) => option === normalized) ?? fallback;
};

const parseBooleanEnv = (value: string | undefined, fallback: boolean): boolean => {
  const normalized = normalizeLowercase(value);
  if (normalized && ["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (normalized && ["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }
  return fallback;
};

export const getLoggingConfigFromEnv = (env: NodeJS.ProcessEnv): LoggingConfig => ({
  pinoLogLevel: pickOption(PINO_LOG_LEVELS, env.LOG_LEVEL, "info"),
  httpAccessLogMode: pickOption(HTTP_ACCESS_LOG_MODES, env.MONITOR_HTTP_ACCESS_LOG_MODE, "errors"),
  includeNoisyHttpAccessRoutes: parseBooleanEnv(env.MONITOR_HTTP_ACCESS_LOG_INCLUDE_NOISY, false),
});
