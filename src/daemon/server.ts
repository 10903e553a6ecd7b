import { createServer, type Server, type IncomingMessage, type ServerResponse } from "node:http";
import type { FairSchedulerMetrics } from "../metrics/exporter.js";
import type { IClusterView, ITaskCatalog } from "../host/interfaces.js";
import type { FairSchedulerService } from "../service/fair-scheduler-service.js";
import { errorMessage } from "../logging/diagnostics.js";
import { getHealthStatus } from "./health.js";

export interface SchedulerServerOptions {
  service: FairSchedulerService;
  startedAt: number;
  metrics?: FairSchedulerMetrics;
  /** Enables GET /decide when provided. */
  cluster?: IClusterView & ITaskCatalog;
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function sendText(res: ServerResponse, status: number, body: string, contentType = "text/plain"): void {
  res.writeHead(status, { "Content-Type": contentType });
  res.end(body);
}

/**
 * HTTP surface of the daemon:
 * - GET /health   service health (503 when unhealthy)
 * - GET /sla      latest SLA figure, for the UI widget
 * - GET /metrics  Prometheus text format
 * - GET /decide?node=<name>&task=<name>  admission decision against the loaded state
 */
export function createSchedulerServer(
  opts: SchedulerServerOptions,
  port = 3000,
  bind = "127.0.0.1",
): Server {
  const { service, metrics, cluster } = opts;

  const server = createServer(async (req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url ?? "/", "http://localhost");

    if (req.method !== "GET") {
      sendText(res, 404, "Not Found");
      return;
    }

    try {
      switch (url.pathname) {
        case "/health": {
          const health = getHealthStatus({ startedAt: opts.startedAt, service: service.getStatus() });
          sendJson(res, health.status === "healthy" ? 200 : 503, health);
          return;
        }
        case "/sla":
          sendJson(res, 200, service.getFigure());
          return;
        case "/metrics":
          if (!metrics) break;
          sendText(res, 200, await metrics.getMetrics(), metrics.registry.contentType);
          return;
        case "/decide": {
          if (!cluster) break;
          const nodeName = url.searchParams.get("node");
          const taskName = url.searchParams.get("task");
          if (!nodeName || !taskName) {
            sendJson(res, 400, { error: "node and task query parameters are required" });
            return;
          }
          const node = cluster.getNode(nodeName);
          const task = cluster.getTask(taskName);
          if (!node || !task) {
            sendJson(res, 404, { error: `Unknown ${node ? "task" : "node"}: ${node ? taskName : nodeName}` });
            return;
          }
          sendJson(res, 200, service.canTake(node, task));
          return;
        }
      }
      sendText(res, 404, "Not Found");
    } catch (err) {
      sendJson(res, 500, { error: errorMessage(err) });
    }
  });

  server.listen(port, bind);
  return server;
}
