import { describe, expect, it } from "vitest";
import type { ITcpSocket } from "../interfaces/socket.js";
import { fromString } from "../utils/buffer.js";
import { HttpRequestReader, readRequestText } from "./request-reader.js";

/** Create a mock socket that delivers data and then closes */
function mockSocket(rawRequest: string): ITcpSocket {
  let dataCallback: ((data: Uint8Array) => void) | null = null;
  let closeCallback: ((hadError: boolean) => void) | null = null;

  return {
    send() {},
    onData(cb) {
      dataCallback = cb;
      queueMicrotask(() => {
        dataCallback?.(fromString(rawRequest));
      });
    },
    onClose(cb) {
      closeCallback = cb;
      queueMicrotask(() => {
        queueMicrotask(() => {
          closeCallback?.(false);
        });
      });
    },
    onError() {},
    close() {},
  };
}

/** Create a mock socket that delivers data in multiple chunks */
function chunkedMockSocket(chunks: string[]): ITcpSocket {
  let dataCallback: ((data: Uint8Array) => void) | null = null;
  let closeCallback: ((hadError: boolean) => void) | null = null;

  return {
    send() {},
    onData(cb) {
      dataCallback = cb;
      let delay = 0;
      for (const chunk of chunks) {
        setTimeout(() => dataCallback?.(fromString(chunk)), delay);
        delay += 5;
      }
    },
    onClose(cb) {
      closeCallback = cb;
      setTimeout(() => closeCallback?.(false), chunks.length * 5 + 10);
    },
    onError() {},
    close() {},
  };
}

function silentSocket(): ITcpSocket {
  return {
    send() {},
    onData() {},
    onClose() {},
    onError() {},
    close() {},
  };
}

describe("readRequestText", () => {
  it("returns the head up to and including the blank line", async () => {
    const text = await readRequestText(
      mockSocket("GET /index.html HTTP/1.1\r\nHost: localhost\r\n\r\n"),
    );
    expect(text).toBe("GET /index.html HTTP/1.1\r\nHost: localhost\r\n\r\n");
  });

  it("does not include bytes after the head", async () => {
    const text = await readRequestText(
      mockSocket("POST /submit HTTP/1.1\r\nHost: a\r\n\r\n{\"key\":\"value\"}"),
    );
    expect(text).toBe("POST /submit HTTP/1.1\r\nHost: a\r\n\r\n");
  });

  it("handles chunked delivery", async () => {
    const text = await readRequestText(
      chunkedMockSocket(["GET /file.txt", " HTTP/1.1\r\nHost: loc", "alhost\r\n\r\n"]),
    );
    expect(text).toBe("GET /file.txt HTTP/1.1\r\nHost: localhost\r\n\r\n");
  });

  it("reads consecutive heads from one reader", async () => {
    const reader = new HttpRequestReader(
      chunkedMockSocket([
        "GET /one HTTP/1.1\r\n\r\nGET /two HTTP/1.1\r\n\r\n",
      ]),
    );

    expect(await reader.readRequestText()).toBe("GET /one HTTP/1.1\r\n\r\n");
    expect(await reader.readRequestText()).toBe("GET /two HTTP/1.1\r\n\r\n");
  });

  it("rejects heads larger than the limit", async () => {
    await expect(
      readRequestText(
        mockSocket(`GET / HTTP/1.1\r\nCookie: ${"a".repeat(200)}\r\n\r\n`),
        { maxHeaderSize: 64 },
      ),
    ).rejects.toMatchObject({ code: "HEADERS_TOO_LARGE" });
  });

  it("reports a connection closed mid-request", async () => {
    await expect(
      readRequestText(mockSocket("GET / HTTP/1.1\r\nHost: a")),
    ).rejects.toMatchObject({ code: "CONNECTION_CLOSED_INCOMPLETE" });
  });

  it("reports a connection closed before any byte arrived", async () => {
    await expect(readRequestText(mockSocket(""))).rejects.toMatchObject({
      code: "CONNECTION_CLOSED",
    });
  });

  it("times out idle connections", async () => {
    await expect(
      readRequestText(silentSocket(), { timeoutMs: 20 }),
    ).rejects.toMatchObject({
      code: "IDLE_TIMEOUT",
    });
  });

  it("rethrows socket errors", async () => {
    const failure = new Error("ECONNRESET");
    const socket: ITcpSocket = {
      ...silentSocket(),
      onError(cb) {
        queueMicrotask(() => cb(failure));
      },
    };

    await expect(readRequestText(socket, { timeoutMs: 1000 })).rejects.toBe(
      failure,
    );
  });
});
