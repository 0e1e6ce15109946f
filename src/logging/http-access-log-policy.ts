import type { FastifyInstance } from "fastify";
import type { HttpAccessLogMode } from "../config/logging-config.js";

export type HttpAccessLogPolicyConfig = {
  mode: HttpAccessLogMode;
  includeNoisyRoutes: boolean;
};

type AccessLogLevel = "error" | "warn" | "info";

type HttpAccessLogDecision = {
  shouldLog: boolean;
  level: AccessLogLevel | null;
};

const SKIP: HttpAccessLogDecision = { shouldLog: false, level: null };

// Polled by uptime checks and dashboards.
const NOISY_HTTP_ACCESS_ROUTE_KEYS = new Set<string>([
  "GET:/rest/health",
  "GET:/rest/monitor/status",
  "GET:/rest/monitor/alerts",
]);

const buildAccessRouteKey = (method: string, url: string): string => {
  const pathOnly = url.split("?", 1)[0] ?? "";
  return `${method.toUpperCase()}:${pathOnly.replace(/\/+$/, "") || "/"}`;
};

const isNoisyHttpAccessRoute = (method: string, url: string): boolean =>
  NOISY_HTTP_ACCESS_ROUTE_KEYS.has(buildAccessRouteKey(method, url));

const levelForStatus = (statusCode: number): AccessLogLevel => {
  if (statusCode >= 500) {
    return "error";
  }
  return statusCode >= 400 ? "warn" : "info";
};

const resolveHttpAccessLogDecision = (
  config: HttpAccessLogPolicyConfig,
  method: string,
  url: string,
  statusCode: number,
): HttpAccessLogDecision => {
  switch (config.mode) {
    case "off":
      return SKIP;
    case "errors":
      return statusCode >= 400 ? { shouldLog: true, level: levelForStatus(statusCode) } : SKIP;
    case "all":
      if (statusCode < 400 && !config.includeNoisyRoutes && isNoisyHttpAccessRoute(method, url)) {
        return SKIP;
      }
      return { shouldLog: true, level: levelForStatus(statusCode) };
  }
};

export const registerHttpAccessLogPolicy = (app: FastifyInstance, config: HttpAccessLogPolicyConfig): void => {
  if (config.mode === "off") {
    return;
  }

  app.addHook("onResponse", async (request, reply) => {
    const decision = resolveHttpAccessLogDecision(config, request.method, request.url, reply.statusCode);
    if (!decision.shouldLog || !decision.level) {
      return;
    }
    request.log[decision.level](
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        elapsedMs: Math.round(reply.elapsedTime),
      },
      "http request completed",
    );
  });
};

export const __testOnly = {
  isNoisyHttpAccessRoute,
  resolveHttpAccessLogDecision,
  buildAccessRouteKey,
};
