// Node adapters
export {
  NodeFileSystem,
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/index.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export { defaultConfig } from "./config/server-config.js";
// HTTP
export {
  HttpRequestParseError,
  type HttpRequestParseErrorCode,
  InternalConsistencyError,
} from "./http/errors.js";
export type { HttpRequest } from "./http/request.js";
export { createHttpRequest, REQUEST_HEADER_FIELDS } from "./http/request.js";
export { type ParseRequestOptions, parseRequest } from "./http/request-parser.js";
export {
  HttpRequestReader,
  HttpRequestReadError,
  type HttpRequestReadErrorCode,
  type ReadRequestOptions,
  readRequestText,
} from "./http/request-reader.js";
export { HttpResponse } from "./http/response.js";
export {
  formatResponseHeader,
  ResponseHeader,
  type ResponseHeaderKind,
  validateResponseHeader,
} from "./http/response-header.js";
export { writeResponse } from "./http/response-writer.js";
export { Status, statusCode, statusText } from "./http/status.js";
export { ALLOWED_METHODS, HTTP_VERSION } from "./http/types.js";
export type {
  IFileStat,
  IFileSystem,
} from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  isLogLevel,
  prefixedLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
export type { StaticServerOptions } from "./server/static-server.js";
export { StaticServer } from "./server/static-server.js";
// Server
export type { WebServerEvents, WebServerOptions } from "./server/web-server.js";
export { WebServer } from "./server/web-server.js";
// Testing
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
export { InMemorySocketFactory } from "./testing/in-memory-socket-factory.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export { EventEmitter } from "./utils/event-emitter.js";
