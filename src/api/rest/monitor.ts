import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { MarketRunResult } from "../../programme-monitor/domain/models.js";
import type { AlertLogProvider } from "../../programme-monitor/providers/alert-log-provider.js";
import type { PollScheduler } from "../../programme-monitor/runtime/poll-scheduler.js";
import type { OperatorStatusService } from "../../programme-monitor/services/operator-status-service.js";

export type MonitorRouteDependencies = {
  statusService: Pick<OperatorStatusService, "getStatus">;
  scheduler: Pick<PollScheduler, "hasMarket" | "runNow">;
  alertLog: Pick<AlertLogProvider, "listRecent">;
};

export const DEFAULT_ALERT_LIMIT = 50;
export const MAX_ALERT_LIMIT = 500;

const alertsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_ALERT_LIMIT).default(DEFAULT_ALERT_LIMIT),
});

const marketParamsSchema = z.object({
  marketKey: z.string().trim().min(1),
});

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");

const toRunResponse = (result: MarketRunResult): { statusCode: number; body: MarketRunResult } => ({
  statusCode: result.status === "completed" ? 200 : 500,
  body: result,
});

export async function registerMonitorRoutes(app: FastifyInstance, deps: MonitorRouteDependencies): Promise<void> {
  app.get("/monitor/status", async () => deps.statusService.getStatus());

  app.get("/monitor/alerts", async (request, reply) => {
    const parsed = alertsQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: `Invalid query: ${formatIssues(parsed.error)}` });
    }
    const entries = await deps.alertLog.listRecent(parsed.data.limit);
    return { entries };
  });

  app.post("/monitor/markets/:marketKey/run", async (request, reply) => {
    const parsed = marketParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: `Invalid market: ${formatIssues(parsed.error)}` });
    }
    const marketKey = parsed.data.marketKey.toUpperCase();
    if (!deps.scheduler.hasMarket(marketKey)) {
      return reply.code(404).send({ error: `Market '${marketKey}' is not monitored.` });
    }
    const response = toRunResponse(await deps.scheduler.runNow(marketKey));
    return reply.code(response.statusCode).send(response.body);
  });
}
