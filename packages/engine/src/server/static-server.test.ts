import { beforeEach, describe, expect, it, vi } from "vitest";
import { createHttpRequest } from "../http/request.js";
import { Status } from "../http/status.js";
import type { Logger } from "../logging/logger.js";
import { InMemoryFileSystem } from "../testing/in-memory-filesystem.js";
import { decodeToString } from "../utils/buffer.js";
import { decodeRequestPath, StaticServer } from "./static-server.js";

const FIXED_DATE = "Wed, 14 Feb 2018 11:27:44 GMT";

function get(url: string, method = "GET") {
  return createHttpRequest({ method, url, version: "1.1" });
}

let fs: InMemoryFileSystem;
let logger: Logger;
let server: StaticServer;

beforeEach(async () => {
  fs = new InMemoryFileSystem();
  await fs.writeFile("/site/hello.txt", "Hello, world!");
  await fs.writeFile("/site/index.html", "<h1>Home</h1>");
  await fs.writeFile("/site/app.js", "run()");
  await fs.mkdir("/site/docs");

  logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  server = new StaticServer({
    root: "/site/",
    fs,
    serverName: "test-server",
    logger,
    now: () => new Date(Date.UTC(2018, 1, 14, 11, 27, 44)),
  });
});

describe("StaticServer", () => {
  it("serves a file with the full header set", async () => {
    const res = await server.handleRequest(get("/hello.txt"));

    expect(decodeToString(res.render())).toBe(
      [
        "HTTP/1.1 200 OK",
        "Server: test-server",
        `Date: ${FIXED_DATE}`,
        "Accept-Ranges: none",
        "Content-Type: text/plain; charset=utf-8",
        "Content-Length: 13",
        "",
        "Hello, world!",
      ].join("\r\n"),
    );
  });

  it("serves index.html for the root directory", async () => {
    const res = await server.handleRequest(get("/"));

    expect(res.status).toBe(Status.Ok);
    expect(decodeToString(res.body)).toBe("<h1>Home</h1>");
    expect(res.headers).toContainEqual({
      kind: "ContentType",
      value: "text/html; charset=utf-8",
    });
  });

  it("picks the content type from the extension", async () => {
    const res = await server.handleRequest(get("/app.js"));
    expect(res.headers).toContainEqual({
      kind: "ContentType",
      value: "text/javascript; charset=utf-8",
    });
  });

  it("answers HEAD with headers only", async () => {
    const res = await server.handleRequest(get("/hello.txt", "HEAD"));

    expect(res.status).toBe(Status.Ok);
    expect(res.body.length).toBe(0);
    expect(res.headers).toContainEqual({ kind: "ContentLength", value: 13 });
  });

  it("treats POST like GET", async () => {
    const res = await server.handleRequest(get("/hello.txt", "POST"));
    expect(res.status).toBe(Status.Ok);
    expect(decodeToString(res.body)).toBe("Hello, world!");
  });

  it("rejects other methods with an Allow header", async () => {
    const res = await server.handleRequest(get("/hello.txt", "DELETE"));

    expect(decodeToString(res.render())).toBe(
      [
        "HTTP/1.1 405 METHOD NOT ALLOWED",
        "Server: test-server",
        `Date: ${FIXED_DATE}`,
        "Allow: GET, POST, HEAD",
        "Content-Type: text/plain; charset=utf-8",
        "Content-Length: 18",
        "",
        "Method Not Allowed",
      ].join("\r\n"),
    );
  });

  it("returns 404 for a missing file", async () => {
    const res = await server.handleRequest(get("/missing.txt"));

    expect(res.status).toBe(Status.NotFound);
    expect(decodeToString(res.body)).toBe("Not Found");
    expect(res.headers).toContainEqual({ kind: "ContentLength", value: 9 });
  });

  it("returns 404 to HEAD without a body", async () => {
    const res = await server.handleRequest(get("/missing.txt", "HEAD"));

    expect(res.status).toBe(Status.NotFound);
    expect(res.body.length).toBe(0);
    expect(res.headers).toContainEqual({ kind: "ContentLength", value: 9 });
  });

  it("returns 404 for a directory without index.html", async () => {
    const res = await server.handleRequest(get("/docs/"));
    expect(res.status).toBe(Status.NotFound);
  });

  it("ignores query strings and resolves dot segments inside the root", async () => {
    const res = await server.handleRequest(get("/docs/../hello.txt?v=2"));
    expect(res.status).toBe(Status.Ok);
    expect(decodeToString(res.body)).toBe("Hello, world!");
  });

  it("returns 400 for an undecodable path", async () => {
    const res = await server.handleRequest(get("/%E0%A4%A"));

    expect(res.status).toBe(Status.BadRequest);
    expect(decodeToString(res.body)).toBe("Bad Request");
  });

  it("returns 500 and logs when the file system fails", async () => {
    const failure = new Error("EIO: i/o error");
    await fs.writeFile("/site/broken.txt", "x");
    fs.failOn("/site/broken.txt", failure);

    const res = await server.handleRequest(get("/broken.txt"));

    expect(res.status).toBe(Status.InternalServerError);
    expect(decodeToString(res.body)).toBe("Internal Server Error");
    expect(logger.error).toHaveBeenCalledWith("Error serving request:", failure);
  });
});

describe("decodeRequestPath", () => {
  it("decodes percent escapes and normalizes segments", () => {
    expect(decodeRequestPath("/a%20b//c/./d/../e.txt")).toBe("/a b/c/e.txt");
  });

  it("cannot climb above the root", () => {
    expect(decodeRequestPath("/../../etc/passwd")).toBe("/etc/passwd");
    expect(decodeRequestPath("/%2e%2e/%2e%2e/x")).toBe("/x");
  });

  it("strips query and fragment", () => {
    expect(decodeRequestPath("/file.txt?x=1#top")).toBe("/file.txt");
  });

  it("returns null for malformed escapes and NUL bytes", () => {
    expect(decodeRequestPath("/%zz")).toBeNull();
    expect(decodeRequestPath("/a%00b")).toBeNull();
  });
});
