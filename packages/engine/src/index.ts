// Node adapters
export {
  NodeFileHandle,
  NodeFileSystem,
} from "./adapters/node/node-filesystem.js";
export {
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/node-socket.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export { defaultConfig } from "./config/server-config.js";
// Content
export type { ContentSource } from "./content/content-source.js";
export type { FileSystemContentSourceOptions } from "./content/filesystem-content-source.js";
export { FileSystemContentSource } from "./content/filesystem-content-source.js";
// Errors
export { ConnectionIOError } from "./errors.js";
// HTTP
export type {
  HttpRequestHead,
  HttpRequestParseErrorCode,
  ParseHttpRequestOptions,
} from "./http/request-parser.js";
export {
  createHttpRequestParser,
  HttpRequestParseError,
  normalizeRequestTarget,
  parseHttpRequest,
  parseRequestHead,
} from "./http/request-parser.js";
export type {
  ParsedHttpResponse,
  ParseHttpResponseOptions,
} from "./http/response-parser.js";
export {
  parseHttpResponse,
  parseHttpResponses,
} from "./http/response-parser.js";
export type { WriteResponseOptions } from "./http/response-writer.js";
export {
  formatHeaderName,
  serializeResponse,
  writeResponse,
} from "./http/response-writer.js";
export type {
  HeaderPolicy,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpStatus,
  HttpVersion,
} from "./http/types.js";
export { HTTP_METHODS, STATUS_TEXT } from "./http/types.js";
export type {
  IFileHandle,
  IFileStat,
  IFileSystem,
} from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
  ListenOptions,
} from "./interfaces/socket.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  isLogLevel,
  LOG_LEVELS,
  prefixedLogger,
  silentLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer, serve } from "./presets/node.js";
// Server
export type {
  ConnectionEndReason,
  ConnectionWorkerOptions,
} from "./server/connection-worker.js";
export {
  ConnectionWorker,
  shouldKeepAlive,
} from "./server/connection-worker.js";
export type {
  ResolveErrorKind,
  ResourceResolverOptions,
} from "./server/resource-resolver.js";
export { ResolveError, ResourceResolver } from "./server/resource-resolver.js";
export type {
  ServerStats,
  WebServerEvents,
  WebServerOptions,
} from "./server/web-server.js";
export { WebServer } from "./server/web-server.js";
// Testing
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
export {
  InMemoryClient,
  InMemorySocketFactory,
} from "./testing/in-memory-socket-factory.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export { EventEmitter } from "./utils/event-emitter.js";
