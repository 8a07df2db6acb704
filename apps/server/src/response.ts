import {
  allowOriginHeaders,
  corsHeaders,
  httpVersion,
  statusReasons,
  type HttpResponse,
  type StatusCode
} from "@static-gate/shared";

const encoder = new TextEncoder();
const empty = new Uint8Array(0);

function toBytes(body: Uint8Array | string): Uint8Array {
  return typeof body === "string" ? encoder.encode(body) : body;
}

/** 200/404 style: full CORS header set. */
export function contentResponse(status: StatusCode, body: Uint8Array | string, contentType: string): HttpResponse {
  return {
    status,
    headers: { "Content-Type": contentType, ...corsHeaders },
    body: toBytes(body)
  };
}

/** 400/405/500: a small HTML page and Allow-Origin only. */
export function errorResponse(status: StatusCode): HttpResponse {
  return {
    status,
    headers: { "Content-Type": "text/html", ...allowOriginHeaders },
    body: encoder.encode(`<html><body><h1>${status} ${statusReasons[status]}</h1></body></html>`)
  };
}

export function rateLimitedResponse(): HttpResponse {
  return {
    status: 429,
    headers: { "Content-Type": "text/plain", ...allowOriginHeaders },
    body: encoder.encode("Rate limit exceeded")
  };
}

export function preflightResponse(): HttpResponse {
  return { status: 204, headers: { ...corsHeaders }, body: empty };
}

/**
 * Renders the status line, headers and body as one buffer. Content-Length is
 * computed here from the body; a 204 carries neither a length nor a body.
 */
export function serializeResponse(response: HttpResponse): Buffer {
  const lines = [`${httpVersion} ${response.status} ${statusReasons[response.status]}`];
  const body = response.status === 204 ? empty : response.body;

  if (response.status !== 204) lines.push(`Content-Length: ${body.byteLength}`);
  for (const [name, value] of Object.entries(response.headers)) {
    if (name.toLowerCase() === "content-length" || name.toLowerCase() === "connection") continue;
    lines.push(`${name}: ${value}`);
  }
  lines.push("Connection: close");

  const head = Buffer.from(`${lines.join("\r\n")}\r\n\r\n`, "latin1");
  return Buffer.concat([head, body]);
}
