export interface ServerConfig {
  /** Port to listen on. Default: 8080 */
  port: number;
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /** Root directory to serve. */
  root: string;
  /** Value of the `Server` response header. Default: 'webserver' */
  serverName: string;
  /** Suppress request logging. Default: false */
  quiet: boolean;
  /** Max time allowed for receiving a full request head. Default: 5000ms */
  requestTimeoutMs: number;
  /** Max size of the request line plus headers. Default: 8KB */
  maxHeaderSize: number;
}

export function defaultConfig(root: string): ServerConfig {
  return {
    port: 8080,
    host: "127.0.0.1",
    root,
    serverName: "webserver",
    quiet: false,
    requestTimeoutMs: 5000,
    maxHeaderSize: 8 * 1024,
  };
}
