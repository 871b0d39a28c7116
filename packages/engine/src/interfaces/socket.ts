/**
 * Transport seam between the connection handler and a runtime. The server
 * only ever talks to these types; `adapters/node` backs them with `node:net`
 * and `testing/` with an in-process socket pair.
 */

export type DataListener = (chunk: Uint8Array) => void;
export type CloseListener = (hadError: boolean) => void;
export type ErrorListener = (err: Error) => void;

/** One accepted connection, as seen by the server. */
export interface ITcpSocket {
  /** Peer address for access logs, if the transport knows it. */
  readonly remoteAddress?: string;

  /** Queue bytes for the peer. Silently dropped once the socket is closed. */
  send(data: Uint8Array): void;

  /** Like `send`, settling once the bytes are flushed or the write fails. */
  sendAndWait?(data: Uint8Array): Promise<void>;

  onData(listener: DataListener): void;
  onClose(listener: CloseListener): void;
  onError(listener: ErrorListener): void;

  /** Finish pending writes, then release the connection. */
  close(): void;
}

export interface TcpServerAddress {
  port: number;
}

/** A listening endpoint handing out raw runtime sockets. */
export interface ITcpServer {
  listen(port: number, host?: string, onListening?: () => void): void;

  /** `null` until listening. Reports the bound port when 0 was requested. */
  address(): TcpServerAddress | null;

  /** Receives the runtime's own socket object; wrap it via the factory. */
  onConnection(listener: (rawSocket: unknown) => void): void;
  onError(listener: ErrorListener): void;

  close(onClosed?: () => void): void;
}

export interface ISocketFactory {
  createTcpServer(): ITcpServer;

  /** Adapt a socket delivered by `onConnection`; throws for foreign objects. */
  wrapTcpSocket(rawSocket: unknown): ITcpSocket;
}
