import http from "node:http";
import type { Logger } from "pino";
import { Counter, Gauge, Histogram, Registry } from "prom-client";
import type { VisitorCounter } from "./visitor-counter.js";

export type ServerMetrics = {
  registry: Registry;
  responses: Counter<"status">;
  activeConnections: Gauge;
  requestDuration: Histogram;
};

export function createMetrics(visitors?: VisitorCounter, registry = new Registry()): ServerMetrics {
  const responses = new Counter({
    name: "static_gate_responses_total",
    help: "Responses written, by status code",
    labelNames: ["status"] as const,
    registers: [registry]
  });
  const activeConnections = new Gauge({
    name: "static_gate_active_connections",
    help: "Connections currently holding a handler slot",
    registers: [registry]
  });
  const requestDuration = new Histogram({
    name: "static_gate_request_duration_seconds",
    help: "Time from slot admission to connection close",
    buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.5, 1],
    registers: [registry]
  });

  if (visitors) {
    new Gauge({
      name: "static_gate_visitor_count",
      help: "Current visitor counter value",
      registers: [registry],
      collect() {
        this.set(visitors.current);
      }
    });
  }

  return { registry, responses, activeConnections, requestDuration };
}

export type MetricsListen = { host: string; port: number };

/** Serves /metrics and /healthz on a port of its own, away from the public listener. */
export async function startMetricsServer(
  { host, port }: MetricsListen,
  registry: Registry,
  logger: Logger
): Promise<http.Server> {
  const server = http.createServer(async (req, res) => {
    if (req.url === "/healthz") {
      res.writeHead(200, { "content-type": "application/json" });
      res.end(JSON.stringify({ ok: true }));
      return;
    }

    if (req.url === "/metrics") {
      try {
        const body = await registry.metrics();
        res.setHeader("content-type", registry.contentType);
        res.end(body);
      } catch (err) {
        logger.error({ err }, "metrics collection failed");
        res.writeHead(500).end("metrics unavailable");
      }
      return;
    }

    res.writeHead(404).end("not found");
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen({ host, port }, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  if (typeof address === "object" && address) logger.info({ host: address.address, port: address.port }, "metrics online");
  else logger.info({ host, port }, "metrics online");
  return server;
}
