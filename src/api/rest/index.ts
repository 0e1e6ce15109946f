import type { FastifyInstance } from "fastify";
import { registerHealthRoutes } from "./health.js";
import { registerMonitorRoutes, type MonitorRouteDependencies } from "./monitor.js";

export async function registerRestRoutes(app: FastifyInstance, deps: MonitorRouteDependencies): Promise<void> {
  await registerHealthRoutes(app);
  await registerMonitorRoutes(app, deps);
}
