export {
  getMonitorConfigFromEnv,
  parseDuration,
  MonitorConfigError,
  type MonitorConfig,
} from "./monitor-config.js";
export {
  getLoggingConfigFromEnv,
  type LoggingConfig,
  type HttpAccessLogMode,
  type PinoLogLevel,
} from "./logging-config.js";
