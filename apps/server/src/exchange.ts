import { contentTypeFor, parseRequestHead, type HttpResponse } from "@static-gate/shared";
import type { Logger } from "pino";
import type { RateLimiter } from "./rate-limit.js";
import type { RequestLog } from "./request-log.js";
import {
  contentResponse,
  errorResponse,
  preflightResponse,
  rateLimitedResponse
} from "./response.js";
import { resolveStaticPath, type FileSource, type StaticLayout } from "./static-files.js";
import type { VisitorCounter } from "./visitor-counter.js";

export const visitorCountPath = "/visitor-count";

export interface Exchange {
  respond(rawHead: Uint8Array, clientIdentity: string): Promise<HttpResponse>;
}

export type RequestExchangeOptions = StaticLayout & {
  rateLimiter: RateLimiter;
  visitors: VisitorCounter;
  files: FileSource;
  requestLog: RequestLog;
  logger: Logger;
  notFoundPage: string;
};

/**
 * Turns one request head into exactly one response. Routing order matters:
 * malformed requests are answered before the rate limiter sees them, and the
 * visitor counter answers any method before the OPTIONS/GET checks.
 */
export class RequestExchange implements Exchange {
  constructor(private readonly options: RequestExchangeOptions) {}

  async respond(rawHead: Uint8Array, clientIdentity: string): Promise<HttpResponse> {
    const { logger } = this.options;
    const request = parseRequestHead(rawHead);
    if (!request) {
      logger.info({ clientIdentity }, "malformed request line");
      return errorResponse(400);
    }

    const { method, path } = request;
    logger.info({ method, path, clientIdentity }, "request");

    if (!this.admit(clientIdentity)) {
      logger.info({ clientIdentity }, "rate limit exceeded");
      return rateLimitedResponse();
    }

    if (path === visitorCountPath) return this.countVisitor();

    if (method === "OPTIONS") return preflightResponse();
    if (method !== "GET") return errorResponse(405);

    const target = resolveStaticPath(path, this.options);
    if (!target.ok) {
      if (target.reason === "traversal") logger.warn({ path, clientIdentity }, "blocked path traversal");
      return this.notFound();
    }

    const contents = await this.options.files.read(target.filePath);
    if (!contents) {
      logger.info({ filePath: target.filePath, status: 404 }, "not found");
      return this.notFound();
    }

    logger.info({ filePath: target.filePath, status: 200 }, "served");
    this.options.requestLog.logRequest(clientIdentity, `${method} ${path} 200`);
    return contentResponse(200, contents, contentTypeFor(target.filePath));
  }

  // Limiter faults admit the request.
  private admit(clientIdentity: string): boolean {
    try {
      return this.options.rateLimiter.allow(clientIdentity);
    } catch (err) {
      this.options.logger.error({ err, clientIdentity }, "rate limiter failed, admitting request");
      return true;
    }
  }

  private countVisitor(): HttpResponse {
    let count: number;
    try {
      count = this.options.visitors.incrementAndGet();
    } catch (err) {
      this.options.logger.error({ err }, "visitor counter failed");
      return errorResponse(500);
    }
    this.options.logger.debug({ count }, "visitor counted");
    return contentResponse(200, String(count), "text/plain");
  }

  private async notFound(): Promise<HttpResponse> {
    const page = await this.options.files.read(this.options.notFoundPage);
    return page
      ? contentResponse(404, page, "text/html")
      : contentResponse(404, "404 Not Found", "text/plain");
  }
}
