import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, decodeToString } from "../utils/buffer.js";

const CRLF_CRLF = new Uint8Array([13, 10, 13, 10]); // \r\n\r\n
const DEFAULT_MAX_HEADER_SIZE = 8 * 1024; // 8KB
const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

export interface ReadRequestOptions {
  maxHeaderSize?: number;
  timeoutMs?: number;
}

export type HttpRequestReadErrorCode =
  | "IDLE_TIMEOUT"
  | "REQUEST_TIMEOUT"
  | "CONNECTION_CLOSED"
  | "CONNECTION_CLOSED_INCOMPLETE"
  | "HEADERS_TOO_LARGE";

export class HttpRequestReadError extends Error {
  constructor(
    readonly code: HttpRequestReadErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestReadError";
  }
}

function findSequence(buffer: Uint8Array, sequence: Uint8Array): number {
  outer: for (let i = 0; i <= buffer.length - sequence.length; i++) {
    for (let j = 0; j < sequence.length; j++) {
      if (buffer[i + j] !== sequence[j]) continue outer;
    }
    return i;
  }
  return -1;
}

/**
 * Collects bytes from a socket until a full request head has arrived and
 * hands it over as text. Request bodies are not read.
 */
export class HttpRequestReader {
  private buffer: Uint8Array = new Uint8Array(0);
  private closed = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];

  constructor(socket: ITcpSocket) {
    socket.onData((data) => {
      this.buffer = concat([this.buffer, data]);
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.closed = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.closed = true;
      this.notifyWaiters();
    });
  }

  /**
   * Resolve with the request line and header lines, terminating blank
   * line included.
   */
  async readRequestText(options?: ReadRequestOptions): Promise<string> {
    const maxHeaderSize = options?.maxHeaderSize ?? DEFAULT_MAX_HEADER_SIZE;
    const timeoutMs = options?.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    const deadline = Date.now() + timeoutMs;

    while (true) {
      const separatorIndex = findSequence(this.buffer, CRLF_CRLF);
      if (separatorIndex !== -1) {
        if (separatorIndex > maxHeaderSize) {
          throw new HttpRequestReadError(
            "HEADERS_TOO_LARGE",
            "Request headers too large",
          );
        }
        const end = separatorIndex + CRLF_CRLF.length;
        const text = decodeToString(this.buffer.subarray(0, end));
        this.buffer = this.buffer.slice(end);
        return text;
      }

      if (this.buffer.length > maxHeaderSize) {
        throw new HttpRequestReadError(
          "HEADERS_TOO_LARGE",
          "Request headers too large",
        );
      }

      if (this.socketError) {
        throw this.socketError;
      }

      if (this.closed) {
        if (this.buffer.length === 0) {
          throw new HttpRequestReadError(
            "CONNECTION_CLOSED",
            "Connection closed",
          );
        }

        throw new HttpRequestReadError(
          "CONNECTION_CLOSED_INCOMPLETE",
          "Connection closed before request was complete",
        );
      }

      const hadActivity = await this.waitForActivity(deadline - Date.now());
      if (!hadActivity) {
        if (this.buffer.length === 0) {
          throw new HttpRequestReadError(
            "IDLE_TIMEOUT",
            "Connection idle timed out",
          );
        }

        throw new HttpRequestReadError(
          "REQUEST_TIMEOUT",
          "Request timed out before completion",
        );
      }
    }
  }

  private waitForActivity(timeoutMs: number): Promise<boolean> {
    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
        resolve(false);
      }, timeoutMs);

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}

/** Read one request head from a socket. */
export function readRequestText(
  socket: ITcpSocket,
  options?: ReadRequestOptions,
): Promise<string> {
  return new HttpRequestReader(socket).readRequestText(options);
}
