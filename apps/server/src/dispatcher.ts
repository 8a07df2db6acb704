import net, { type AddressInfo, type Socket } from "node:net";
import type { Logger } from "pino";
import type { Exchange } from "./exchange.js";
import type { ServerMetrics } from "./metrics.js";
import { serializeResponse } from "./response.js";
import { Semaphore, type Release } from "./semaphore.js";

export type DispatcherOptions = {
  host: string;
  port: number;
  maxConcurrent: number;
  /** Connections allowed to wait for a slot; the rest are closed on arrival. */
  maxWaiting: number;
  maxHeadBytes: number;
  headTimeoutMs: number;
  exchange: Exchange;
  logger: Logger;
  metrics?: ServerMetrics;
};

export class ConnectionIdleError extends Error {
  constructor(readonly idleMs: number) {
    super(`connection idle for ${idleMs}ms`);
    this.name = "ConnectionIdleError";
  }
}

const headTerminator = Buffer.from("\r\n\r\n");

export function clientIdentityOf(socket: Pick<Socket, "remoteAddress">): string {
  const address = socket.remoteAddress;
  if (!address) return "unknown";
  return address.startsWith("::ffff:") ? address.slice("::ffff:".length) : address;
}

/**
 * Collects bytes until the head terminator, `maxBytes`, or the peer closing,
 * whichever comes first. The result is cut at `maxBytes`.
 */
export function readHead(socket: Socket, maxBytes: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    const cleanup = () => {
      socket.off("data", onData);
      socket.off("end", finish);
      socket.off("close", finish);
      socket.off("error", onError);
      socket.pause();
    };
    function finish() {
      cleanup();
      resolve(Buffer.concat(chunks, size).subarray(0, maxBytes));
    }
    function onError(err: Error) {
      cleanup();
      reject(err);
    }
    function onData(chunk: Buffer) {
      chunks.push(chunk);
      size += chunk.length;
      if (size >= maxBytes || Buffer.concat(chunks, size).includes(headTerminator)) finish();
    }

    socket.on("data", onData);
    socket.once("end", finish);
    socket.once("close", finish);
    socket.once("error", onError);
    socket.resume();
  });
}

function writeAndEnd(socket: Socket, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(data, (err) => {
      if (err) {
        reject(err);
        return;
      }
      socket.end();
      // drain whatever the peer still sends so its FIN is seen and the socket can close
      socket.resume();
      resolve();
    });
  });
}

/**
 * Accepts connections and runs one handler per connection, with at most
 * `maxConcurrent` handlers active. Up to `maxWaiting` connections beyond that
 * wait, paused, for a slot; the OS backlog queues anything not yet accepted.
 * `headTimeoutMs` counts from acceptance, so a queued client that stays silent
 * is dropped without ever taking a slot.
 */
export class Dispatcher {
  private server: net.Server | null = null;
  private readonly sockets = new Set<Socket>();
  private readonly slots: Semaphore;

  constructor(private readonly options: DispatcherOptions) {
    this.slots = new Semaphore(options.maxConcurrent);
  }

  /** Binds the listener. Rejects only when binding fails. */
  async listen(): Promise<AddressInfo> {
    const { host, port, logger } = this.options;
    const server = net.createServer({ pauseOnConnect: true, allowHalfOpen: true }, (socket) => this.accept(socket));

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen({ host, port }, () => {
        server.off("error", reject);
        resolve();
      });
    });

    server.on("error", (err) => logger.error({ err }, "accept failed"));
    this.server = server;

    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error(`unexpected listener address: ${String(address)}`);
    }
    return address;
  }

  get stats() {
    return { ...this.slots.stats, open: this.sockets.size };
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    for (const socket of this.sockets) socket.destroy();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  }

  private accept(socket: Socket) {
    const { logger, maxWaiting, headTimeoutMs } = this.options;
    const clientIdentity = clientIdentityOf(socket);

    const { slots, active, waiting } = this.slots.stats;
    if (active >= slots && waiting >= maxWaiting) {
      logger.warn({ clientIdentity, waiting }, "connection queue full");
      socket.destroy();
      return;
    }

    const closed = new AbortController();
    this.sockets.add(socket);
    socket.on("close", () => {
      this.sockets.delete(socket);
      closed.abort();
    });
    socket.on("error", (err) => logger.debug({ err, clientIdentity }, "socket error"));
    socket.on("timeout", () => socket.destroy(new ConnectionIdleError(headTimeoutMs)));
    socket.setTimeout(headTimeoutMs);
    logger.debug({ clientIdentity }, "connection accepted");

    this.serve(socket, clientIdentity, closed.signal).catch((err: unknown) => {
      logger.error({ err, clientIdentity }, "connection handler crashed");
      socket.destroy();
    });
  }

  private async serve(socket: Socket, clientIdentity: string, closed: AbortSignal): Promise<void> {
    const { exchange, logger, metrics, maxHeadBytes } = this.options;

    let release: Release;
    try {
      release = await this.slots.acquire(closed);
    } catch (err) {
      logger.debug({ err, clientIdentity }, "connection closed while queued");
      return;
    }
    metrics?.activeConnections.inc();
    const stopTimer = metrics?.requestDuration.startTimer();

    try {
      if (socket.destroyed) return;

      const head = await readHead(socket, maxHeadBytes);

      if (head.length === 0) {
        logger.debug({ clientIdentity }, "client closed without a request");
        return;
      }

      const response = await exchange.respond(head, clientIdentity);
      await writeAndEnd(socket, serializeResponse(response));
      metrics?.responses.inc({ status: String(response.status) });
    } catch (err) {
      if (err instanceof ConnectionIdleError) logger.debug({ err, clientIdentity }, "client went idle");
      else logger.error({ err, clientIdentity }, "connection handler failed");
    } finally {
      if (!socket.writableEnded) socket.destroy();
      release();
      metrics?.activeConnections.dec();
      stopTimer?.();
    }
  }
}
