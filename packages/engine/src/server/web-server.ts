import type { ServerConfig } from "../config/server-config.js";
import {
  HttpRequestParseError,
  InternalConsistencyError,
} from "../http/errors.js";
import type { HttpRequest } from "../http/request.js";
import { parseRequest } from "../http/request-parser.js";
import {
  HttpRequestReader,
  HttpRequestReadError,
} from "../http/request-reader.js";
import type { HttpResponse } from "../http/response.js";
import { writeResponse } from "../http/response-writer.js";
import { Status } from "../http/status.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";
import { StaticServer } from "./static-server.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  config: ServerConfig;
  logger?: Logger;
  /** Clock for the `Date` response header. */
  now?: () => Date;
}

export type WebServerEvents = {
  listening: [port: number];
  close: [];
  error: [err: Error];
};

/**
 * Accepts connections, reads one request per connection, answers it from
 * the static file handler and closes the socket.
 */
export class WebServer extends EventEmitter<WebServerEvents> {
  private socketFactory: ISocketFactory;
  private config: ServerConfig;
  private logger: Logger;
  private tcpServer: ITcpServer | null = null;
  private staticServer: StaticServer;
  private activeConnections: Set<ITcpSocket> = new Set();

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();

    this.staticServer = new StaticServer({
      root: this.config.root,
      fs: options.fileSystem,
      serverName: this.config.serverName,
      logger: this.logger,
      now: options.now,
    });
  }

  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.onConnection((rawSocket) => {
        const socket = this.socketFactory.wrapTcpSocket(rawSocket);
        this.handleConnection(socket).catch((err: unknown) => {
          this.logger.error("Connection handler failed:", err);
        });
      });

      server.onError((err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(err);
          return;
        }

        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        const port = addr?.port ?? this.config.port;
        this.emit("listening", port);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.tcpServer;
      this.tcpServer = null;

      for (const socket of this.activeConnections) {
        socket.close();
      }
      this.activeConnections.clear();

      if (!server) {
        this.emit("close");
        resolve();
        return;
      }

      server.close(() => {
        this.emit("close");
        resolve();
      });
    });
  }

  private async handleConnection(socket: ITcpSocket): Promise<void> {
    this.activeConnections.add(socket);

    socket.onClose(() => {
      this.activeConnections.delete(socket);
    });

    socket.onError(() => {
      this.activeConnections.delete(socket);
    });

    const reader = new HttpRequestReader(socket);

    try {
      let text: string;
      try {
        text = await reader.readRequestText({
          timeoutMs: this.config.requestTimeoutMs,
          maxHeaderSize: this.config.maxHeaderSize,
        });
      } catch (err) {
        if (err instanceof HttpRequestReadError && err.code === "HEADERS_TOO_LARGE") {
          await writeResponse(
            socket,
            this.staticServer.textResponse(Status.BadRequest, "Bad Request"),
          );
          return;
        }
        this.logger.debug("Request not received:", err);
        return;
      }

      const response = await this.respond(text, socket.remoteAddress ?? "?");
      await writeResponse(socket, response);
    } finally {
      socket.close();
    }
  }

  private async respond(text: string, addr: string): Promise<HttpResponse> {
    let request: HttpRequest;
    try {
      request = parseRequest(text, { logger: this.logger });
    } catch (err) {
      return this.parseFailureResponse(err);
    }

    if (!this.config.quiet) {
      this.logger.info(`${request.method} ${request.url} - ${addr}`);
    }

    return this.staticServer.handleRequest(request);
  }

  private parseFailureResponse(err: unknown): HttpResponse {
    if (err instanceof HttpRequestParseError) {
      this.logger.debug(`Rejected request (${err.code}): ${err.message}`);
      return this.staticServer.textResponse(Status.BadRequest, "Bad Request");
    }

    if (err instanceof InternalConsistencyError) {
      this.logger.error("Request parser consistency violation:", err);
      return this.staticServer.textResponse(
        Status.InternalServerError,
        "Internal Server Error",
      );
    }

    throw err;
  }
}
