import pino from "pino";
import type { RequestLog } from "../src/request-log.js";
import type { FileSource } from "../src/static-files.js";

export const silentLogger = pino({ level: "silent" });

export type LogLine = { level?: unknown; msg?: unknown; [key: string]: unknown };

/** A debug-level logger that keeps every line it writes. */
export function captureLogger() {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(message: string) {
        lines.push(JSON.parse(message));
      }
    }
  );
  return { logger, lines };
}

export class MemoryFileSource implements FileSource {
  readonly reads: string[] = [];
  private files = new Map<string, Uint8Array>();

  constructor(entries: Record<string, string | Uint8Array> = {}) {
    for (const [filePath, contents] of Object.entries(entries)) this.put(filePath, contents);
  }

  put(filePath: string, contents: string | Uint8Array) {
    this.files.set(filePath, typeof contents === "string" ? new TextEncoder().encode(contents) : contents);
  }

  async read(filePath: string): Promise<Uint8Array | null> {
    this.reads.push(filePath);
    return this.files.get(filePath) ?? null;
  }
}

export class MemoryRequestLog implements RequestLog {
  readonly entries: Array<{ clientIdentity: string; summary: string }> = [];

  logRequest(clientIdentity: string, summary: string) {
    this.entries.push({ clientIdentity, summary });
  }

  close() {}
}

export function text(body: Uint8Array): string {
  return new TextDecoder().decode(body);
}
