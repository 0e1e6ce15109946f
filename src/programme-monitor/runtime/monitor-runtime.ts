import type { Logger } from "pino";
import type { MonitorConfig } from "../../config/monitor-config.js";
import type { AlertLogProvider } from "../providers/alert-log-provider.js";
import { AwinProgrammeSource } from "../providers/awin-programme-source.js";
import { FileAlertLogProvider } from "../providers/file-alert-log-provider.js";
import { FileSnapshotStore } from "../providers/file-snapshot-store.js";
import type { Notifier } from "../providers/notifier.js";
import type { ProgrammeSource } from "../providers/programme-source.js";
import { LogNotifier, SmtpNotifier, isSmtpConfigured } from "../providers/smtp-notifier.js";
import type { SnapshotStore } from "../providers/snapshot-store.js";
import { AlertDispatcher, type SleepFn } from "../services/alert-dispatcher.js";
import { MonitorCycleService } from "../services/monitor-cycle-service.js";
import { OperatorAlertService } from "../services/operator-alert-service.js";
import { OperatorStatusService } from "../services/operator-status-service.js";
import { PollScheduler } from "./poll-scheduler.js";

export type MonitorRuntimeOverrides = {
  source?: ProgrammeSource;
  store?: SnapshotStore;
  notifier?: Notifier;
  alertLog?: AlertLogProvider;
  sleep?: SleepFn;
  now?: () => Date;
};

export type MonitorRuntime = {
  config: MonitorConfig;
  scheduler: PollScheduler;
  statusService: OperatorStatusService;
  alertLog: AlertLogProvider;
  cycleService: MonitorCycleService;
};

const resolveNotifier = (config: MonitorConfig, logger: Logger): Notifier => {
  if (isSmtpConfigured(config.smtp) && config.alerts.from) {
    return new SmtpNotifier({ from: config.alerts.from, settings: config.smtp });
  }
  logger.warn("SMTP host, credentials or sender address missing; alerts will only be written to the log");
  return new LogNotifier(logger.child({ component: "log-notifier" }));
};

export const createMonitorRuntime = (
  config: MonitorConfig,
  logger: Logger,
  overrides: MonitorRuntimeOverrides = {},
): MonitorRuntime => {
  const now = overrides.now ?? (() => new Date());
  const alertLog = overrides.alertLog ?? new FileAlertLogProvider(config.storagePath);
  const notifier = overrides.notifier ?? resolveNotifier(config, logger);

  if (config.alerts.enabled && config.alerts.to.length === 0) {
    logger.warn("ALERT_TO is empty; programme change alerts will fail until recipients are configured");
  }

  const source =
    overrides.source ??
    new AwinProgrammeSource({
      apiBaseUrl: config.awin.apiBaseUrl,
      publisherId: config.awin.publisherId,
      token: config.awin.token,
      timeoutMs: config.awin.timeoutMs,
      now,
    });
  const store = overrides.store ?? new FileSnapshotStore(config.storagePath);

  const dispatcher = new AlertDispatcher({
    notifier,
    recipients: config.alerts.to,
    logger: logger.child({ component: "alert-dispatcher" }),
    maxAttempts: config.delivery.maxAttempts,
    backoff: {
      baseMs: config.delivery.backoffBaseMs,
      factor: config.delivery.backoffFactor,
      maxMs: config.delivery.backoffMaxMs,
    },
    subjectPrefix: config.alerts.subjectPrefix,
    alertLog,
    sleep: overrides.sleep,
    now,
  });

  const operatorAlerts = new OperatorAlertService({
    notifier,
    recipients: config.alerts.operatorTo,
    cooldownMs: config.alerts.cooldownMs,
    logger: logger.child({ component: "operator-alerts" }),
    alertLog,
    subjectPrefix: config.alerts.subjectPrefix,
    feedFailureAlerts: config.alerts.enabled && config.alerts.onFeedFailure,
    now,
  });

  const cycleService = new MonitorCycleService({
    source,
    store,
    dispatcher,
    operatorAlerts,
    logger: logger.child({ component: "monitor-cycle" }),
    toggles: {
      alertsEnabled: config.alerts.enabled,
      alertOnNew: config.alerts.onNew,
      alertOnRemoved: config.alerts.onRemoved,
      alertOnClosed: config.alerts.onClosed,
    },
    now,
  });

  const statusService = new OperatorStatusService({ marketKeys: config.markets, now });

  const scheduler = new PollScheduler({
    marketKeys: config.markets,
    intervalMs: config.pollIntervalMs,
    runOnStart: config.runOnStart,
    shutdownGraceMs: config.shutdownGraceMs,
    cycleService,
    statusService,
    logger: logger.child({ component: "poll-scheduler" }),
  });

  return { config, scheduler, statusService, alertLog, cycleService };
};
