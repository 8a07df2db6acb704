import { readFile } from "node:fs/promises";
import type { Logger } from "pino";

export type StaticTarget =
  | { ok: true; filePath: string }
  | { ok: false; reason: "traversal" | "undecodable" | "relative" };

export type StaticLayout = {
  root: string;
  indexDocument: string;
};

export function hasTraversal(filePath: string): boolean {
  return filePath.split(/[\\/]/).includes("..");
}

/**
 * Maps a request path onto the static root. `/` is the index document; any
 * other path is appended to the root as-is once its query string is dropped
 * and its escapes are decoded.
 */
export function resolveStaticPath(urlPath: string, layout: StaticLayout): StaticTarget {
  const pathname = urlPath.split(/[?#]/, 1)[0] ?? "";

  let decoded: string;
  try {
    decoded = decodeURIComponent(pathname);
  } catch {
    return { ok: false, reason: "undecodable" };
  }

  if (!decoded.startsWith("/")) return { ok: false, reason: "relative" };

  const filePath = decoded === "/" ? `${layout.root}/${layout.indexDocument}` : `${layout.root}${decoded}`;
  if (hasTraversal(filePath)) return { ok: false, reason: "traversal" };

  return { ok: true, filePath };
}

export interface FileSource {
  /** Resolves to the file's bytes, or null when it is missing or unreadable. */
  read(filePath: string): Promise<Uint8Array | null>;
}

export class DiskFileSource implements FileSource {
  constructor(private readonly logger: Logger) {}

  async read(filePath: string): Promise<Uint8Array | null> {
    try {
      return await readFile(filePath);
    } catch (err) {
      this.logger.debug({ err, filePath }, "file unavailable");
      return null;
    }
  }
}
