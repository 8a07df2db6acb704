import type http from "node:http";
import pino from "pino";
import { collectDefaultMetrics } from "prom-client";
import { loadConfig } from "./config.js";
import { Dispatcher } from "./dispatcher.js";
import { RequestExchange } from "./exchange.js";
import { createMetrics, startMetricsServer } from "./metrics.js";
import { SlidingWindowRateLimiter } from "./rate-limit.js";
import { createFileRequestLog } from "./request-log.js";
import { DiskFileSource } from "./static-files.js";
import { InMemoryVisitorCounter } from "./visitor-counter.js";

const config = loadConfig();
const logger = pino({ level: config.LOG_LEVEL });

const visitors = new InMemoryVisitorCounter();
const rateLimiter = new SlidingWindowRateLimiter(
  config.RATE_LIMIT_MAX_REQUESTS,
  config.RATE_LIMIT_WINDOW_MS,
  config.RATE_LIMIT_MAX_CLIENTS
);
const requestLog = createFileRequestLog(config.REQUEST_LOG_PATH, logger);
const metrics = createMetrics(visitors);
collectDefaultMetrics({ register: metrics.registry });

const exchange = new RequestExchange({
  rateLimiter,
  visitors,
  files: new DiskFileSource(logger),
  requestLog,
  logger,
  root: config.STATIC_ROOT,
  indexDocument: config.INDEX_DOCUMENT,
  notFoundPage: config.NOT_FOUND_PAGE
});

const dispatcher = new Dispatcher({
  host: config.HOST,
  port: config.PORT,
  maxConcurrent: config.MAX_CONCURRENT_CONNECTIONS,
  maxWaiting: config.MAX_WAITING_CONNECTIONS,
  maxHeadBytes: config.MAX_REQUEST_HEAD_BYTES,
  headTimeoutMs: config.HEAD_TIMEOUT_MS,
  exchange,
  logger,
  metrics
});

const sweeper = setInterval(() => {
  const removed = rateLimiter.sweep();
  if (removed > 0) logger.debug({ removed, tracked: rateLimiter.size }, "rate limiter swept");
}, config.RATE_LIMIT_WINDOW_MS);
sweeper.unref();

let metricsServer: http.Server | null = null;

const shutdown = async (signal: string) => {
  logger.info({ signal }, "shutting down");
  clearInterval(sweeper);
  await dispatcher.close();
  metricsServer?.close();
  requestLog.close();
  process.exit(0);
};

const onSignal = (signal: string) => {
  shutdown(signal).catch((err: unknown) => {
    logger.error({ err }, "shutdown failed");
    process.exit(1);
  });
};
process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));

try {
  const address = await dispatcher.listen();
  logger.info(
    { host: address.address, port: address.port, maxConcurrent: config.MAX_CONCURRENT_CONNECTIONS },
    "static-gate online"
  );
  if (config.METRICS_PORT > 0) {
    metricsServer = await startMetricsServer({ host: config.HOST, port: config.METRICS_PORT }, metrics.registry, logger);
  }
} catch (err) {
  logger.fatal({ err, host: config.HOST, port: config.PORT }, "failed to bind");
  process.exit(1);
}
