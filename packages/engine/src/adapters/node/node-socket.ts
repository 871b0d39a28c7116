import * as net from "node:net";
import type {
  CloseListener,
  DataListener,
  ErrorListener,
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
  TcpServerAddress,
} from "../../interfaces/socket.js";

/** `ITcpSocket` over a `net.Socket` accepted by {@link NodeTcpServer}. */
export class NodeTcpSocket implements ITcpSocket {
  constructor(private readonly socket: net.Socket) {}

  get remoteAddress(): string | undefined {
    return this.socket.remoteAddress;
  }

  private get open(): boolean {
    return !this.socket.destroyed && this.socket.writable;
  }

  send(data: Uint8Array): void {
    if (this.open) {
      this.socket.write(data);
    }
  }

  sendAndWait(data: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.open) {
        reject(new Error("Socket is not writable"));
        return;
      }
      // The write callback runs after the chunk is flushed, or with the
      // error that destroyed the socket first.
      this.socket.write(data, (err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  onData(listener: DataListener): void {
    this.socket.on("data", (chunk: Buffer) => {
      listener(new Uint8Array(chunk.buffer, chunk.byteOffset, chunk.byteLength));
    });
  }

  onClose(listener: CloseListener): void {
    this.socket.on("close", listener);
  }

  onError(listener: ErrorListener): void {
    this.socket.on("error", listener);
  }

  close(): void {
    if (this.socket.destroyed) return;
    this.socket.end(() => this.socket.destroy());
  }
}

export class NodeTcpServer implements ITcpServer {
  constructor(private readonly server: net.Server = net.createServer()) {}

  listen(port: number, host?: string, onListening?: () => void): void {
    this.server.listen({ port, host }, onListening);
  }

  address(): TcpServerAddress | null {
    const bound = this.server.address();
    // A string address means a pipe or unix socket, which has no port.
    return bound !== null && typeof bound === "object" ? { port: bound.port } : null;
  }

  onConnection(listener: (rawSocket: unknown) => void): void {
    this.server.on("connection", listener);
  }

  onError(listener: ErrorListener): void {
    this.server.on("error", listener);
  }

  close(onClosed?: () => void): void {
    this.server.close(() => onClosed?.());
  }
}

export class NodeSocketFactory implements ISocketFactory {
  createTcpServer(): ITcpServer {
    return new NodeTcpServer();
  }

  wrapTcpSocket(rawSocket: unknown): ITcpSocket {
    if (rawSocket instanceof net.Socket) {
      return new NodeTcpSocket(rawSocket);
    }
    throw new TypeError("NodeSocketFactory can only wrap net.Socket instances");
  }
}
