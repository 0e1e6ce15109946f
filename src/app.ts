import dotenv from "dotenv";
import fastify, { type FastifyInstance } from "fastify";
import { pathToFileURL } from "node:url";
import { registerRestRoutes } from "./api/rest/index.js";
import type { MonitorRouteDependencies } from "./api/rest/monitor.js";
import { getLoggingConfigFromEnv, getMonitorConfigFromEnv, type LoggingConfig } from "./config/index.js";
import { registerHttpAccessLogPolicy } from "./logging/http-access-log-policy.js";
import { createLogger, type Logger } from "./logging/logger.js";
import { createMonitorRuntime, type MonitorRuntime } from "./programme-monitor/runtime/monitor-runtime.js";

type ServerOptions = {
  host: string;
  port: number;
  envFile?: string;
};

const readFlagValue = (argv: string[], index: number, flag: string): { value: string | null; consumed: number } => {
  const arg = argv[index] ?? "";
  if (arg === flag) {
    const next = argv[index + 1];
    return next && !next.startsWith("-") ? { value: next, consumed: 1 } : { value: null, consumed: 0 };
  }
  if (arg.startsWith(`${flag}=`)) {
    return { value: arg.slice(flag.length + 1), consumed: 0 };
  }
  return { value: null, consumed: 0 };
};

export function parseArgs(argv: string[]): ServerOptions {
  const options: ServerOptions = { host: "0.0.0.0", port: 8000 };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? "";
    if (!arg.startsWith("--")) {
      continue;
    }

    const port = readFlagValue(argv, i, "--port");
    if (port.value !== null) {
      const parsed = Number(port.value);
      if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65_535) {
        throw new Error(`--port must be a TCP port. Received: ${port.value}`);
      }
      options.port = parsed;
      i += port.consumed;
      continue;
    }
    const host = readFlagValue(argv, i, "--host");
    if (host.value !== null) {
      options.host = host.value;
      i += host.consumed;
      continue;
    }
    const envFile = readFlagValue(argv, i, "--env-file");
    if (envFile.value !== null) {
      options.envFile = envFile.value;
      i += envFile.consumed;
    }
  }

  return options;
}

export async function buildApp(
  deps: MonitorRouteDependencies,
  loggingConfig: LoggingConfig = getLoggingConfigFromEnv(process.env),
): Promise<FastifyInstance> {
  const app = fastify({
    logger: {
      level: loggingConfig.pinoLogLevel,
    },
    // Access logging is managed by registerHttpAccessLogPolicy().
    disableRequestLogging: true,
  });
  registerHttpAccessLogPolicy(app, {
    mode: loggingConfig.httpAccessLogMode,
    includeNoisyRoutes: loggingConfig.includeNoisyHttpAccessRoutes,
  });

  await app.register(async (scope) => registerRestRoutes(scope, deps), { prefix: "/rest" });
  return app;
}

function registerShutdownHandlers(app: FastifyInstance, runtime: MonitorRuntime, logger: Logger): void {
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, "Shutting down programme monitor");
    try {
      const report = await runtime.scheduler.stop();
      await app.close();
      logger.info({ forced: report.forced }, "Programme monitor stopped");
      process.exit(report.forced ? 1 : 0);
    } catch (error) {
      logger.error({ err: error }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
}

export async function startServer(argv: string[] = process.argv.slice(2)): Promise<void> {
  const options = parseArgs(argv);
  const loaded = dotenv.config(options.envFile ? { path: options.envFile } : {});

  const loggingConfig = getLoggingConfigFromEnv(process.env);
  const logger = createLogger(loggingConfig.pinoLogLevel);
  if (loaded.error && options.envFile) {
    logger.warn({ envFile: options.envFile, err: loaded.error }, "Failed to load env file");
  }

  const config = getMonitorConfigFromEnv(process.env);
  const runtime = createMonitorRuntime(config, logger);
  const app = await buildApp(
    { statusService: runtime.statusService, scheduler: runtime.scheduler, alertLog: runtime.alertLog },
    loggingConfig,
  );
  registerShutdownHandlers(app, runtime, logger);

  await app.listen({ host: options.host, port: options.port });
  logger.info(
    { host: options.host, port: options.port, markets: config.markets, pollIntervalMs: config.pollIntervalMs },
    "Programme monitor listening",
  );
  runtime.scheduler.start();
}

const modulePath = pathToFileURL(process.argv[1] ?? "").href;
if (import.meta.url === modulePath) {
  startServer().catch((error) => {
    console.error(`Failed to start programme monitor: ${String(error)}`);
    process.exit(1);
  });
}
