import { describe, expect, it } from "vitest";
import { contentTypeFor, parseRequestHead, statusReasons } from "../src/index.js";

describe("request line", () => {
  it("reads method, path and version", () => {
    expect(parseRequestHead("GET /index.html HTTP/1.1\r\nHost: localhost\r\n\r\n")).toEqual({
      method: "GET",
      path: "/index.html",
      version: "HTTP/1.1"
    });
  });

  it("accepts a line without a version", () => {
    expect(parseRequestHead(new TextEncoder().encode("POST /visitor-count\r\n\r\n"))).toEqual({
      method: "POST",
      path: "/visitor-count",
      version: undefined
    });
  });

  it("rejects a line with only a method", () => {
    expect(parseRequestHead("GET\r\n\r\n")).toBeNull();
  });

  it("rejects an empty first line", () => {
    expect(parseRequestHead("\r\nGET / HTTP/1.1\r\n\r\n")).toBeNull();
  });

  it("splits on any run of whitespace", () => {
    expect(parseRequestHead("GET \t  /a.css   HTTP/1.0\n\n")?.path).toBe("/a.css");
  });

  it("replaces bytes that are not UTF-8", () => {
    const raw = Uint8Array.from([0x47, 0x45, 0x54, 0x20, 0x2f, 0xff, 0x0d, 0x0a]);
    expect(parseRequestHead(raw)?.path).toBe("/\uFFFD");
  });
});

describe("content types", () => {
  it.each([
    ["public_html/index.html", "text/html"],
    ["public_html/style.css", "text/css"],
    ["public_html/script.js", "application/javascript"],
    ["logo.png", "image/png"],
    ["photo.jpg", "image/jpeg"],
    ["photo.jpeg", "image/jpeg"],
    ["anim.gif", "image/gif"],
    ["icon.svg", "image/svg+xml"],
    ["favicon.ico", "image/x-icon"],
    ["archive.tar.gz", "application/octet-stream"],
    ["README", "application/octet-stream"]
  ])("%s is served as %s", (filePath, expected) => {
    expect(contentTypeFor(filePath)).toBe(expected);
  });
});

describe("status taxonomy", () => {
  it("covers every code the server emits", () => {
    expect(Object.keys(statusReasons)).toEqual(["200", "204", "400", "404", "405", "429", "500"]);
  });
});
