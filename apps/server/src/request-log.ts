import pino, { type Logger } from "pino";

export interface RequestLog {
  logRequest(clientIdentity: string, summary: string): void;
  close(): void;
}

type FileRequestLogOptions = {
  /** Write synchronously; used where the file is read back immediately. */
  sync?: boolean;
};

/**
 * Append-only request log. Failures to write are reported on the operational
 * logger and never reach the request that triggered them.
 */
export function createFileRequestLog(dest: string, ops: Logger, options: FileRequestLogOptions = {}): RequestLog {
  const destination = pino.destination({ dest, append: true, mkdir: true, sync: options.sync ?? false });
  destination.on("error", (err: Error) => ops.error({ err, dest }, "request log write failed"));

  const log = pino({ base: null, timestamp: pino.stdTimeFunctions.isoTime }, destination);

  return {
    logRequest(clientIdentity, summary) {
      try {
        log.info({ clientIdentity }, summary);
      } catch (err) {
        ops.error({ err, dest }, "request log write failed");
      }
    },
    close() {
      destination.end();
    }
  };
}
