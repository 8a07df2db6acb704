import { z } from "zod";

export const httpVersion = "HTTP/1.1";

export const statusReasons = {
  200: "OK",
  204: "No Content",
  400: "Bad Request",
  404: "Not Found",
  405: "Method Not Allowed",
  429: "Too Many Requests",
  500: "Internal Server Error"
} as const;

export type StatusCode = keyof typeof statusReasons;

export type HttpHeaders = Record<string, string>;

/**
 * One response as produced by the exchange. Content-Length is not part of the
 * header set: the serializer derives it from `body`.
 */
export type HttpResponse = {
  status: StatusCode;
  headers: HttpHeaders;
  body: Uint8Array;
};

export const allowOriginHeaders: HttpHeaders = {
  "Access-Control-Allow-Origin": "*"
};

export const corsHeaders: HttpHeaders = {
  ...allowOriginHeaders,
  "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type"
};

const contentTypes: ReadonlyArray<readonly [string, string]> = [
  [".html", "text/html"],
  [".css", "text/css"],
  [".js", "application/javascript"],
  [".png", "image/png"],
  [".jpg", "image/jpeg"],
  [".jpeg", "image/jpeg"],
  [".gif", "image/gif"],
  [".svg", "image/svg+xml"],
  [".ico", "image/x-icon"]
];

export const fallbackContentType = "application/octet-stream";

export function contentTypeFor(filePath: string): string {
  const match = contentTypes.find(([ext]) => filePath.endsWith(ext));
  return match ? match[1] : fallbackContentType;
}

export const requestLineSchema = z.object({
  method: z.string().min(1),
  path: z.string().min(1),
  version: z.string().optional()
});

export type ParsedRequest = z.infer<typeof requestLineSchema>;

/**
 * Reads the request line out of a raw request head. Bytes that are not valid
 * UTF-8 are replaced rather than rejected. Returns null when the line lacks a
 * method or a path.
 */
export function parseRequestHead(raw: Uint8Array | string): ParsedRequest | null {
  const text = typeof raw === "string" ? raw : new TextDecoder().decode(raw);
  const firstLine = text.split(/\r?\n/, 1)[0] ?? "";
  const [method, path, version] = firstLine.trim().split(/\s+/);
  const parsed = requestLineSchema.safeParse({ method, path, version });
  return parsed.success ? parsed.data : null;
}
