import type { ServerConfig } from "../config/server-config.js";
import { ConnectionIOError } from "../errors.js";
import {
  createHttpRequestParser,
  HttpRequestParseError,
  type HttpRequestStreamParser,
  type ParseHttpRequestOptions,
} from "../http/request-parser.js";
import { writeResponse } from "../http/response-writer.js";
import type {
  HttpRequest,
  HttpResponse,
  HttpStatus,
  HttpVersion,
} from "../http/types.js";
import { STATUS_TEXT } from "../http/types.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import type { ResourceResolver } from "./resource-resolver.js";

export type ConnectionEndReason =
  | "closed"
  | "keep-alive-declined"
  | "idle-timeout"
  | "request-timeout"
  | "protocol-error"
  | "io-error"
  | "internal-error";

export type WorkerConfig = Pick<
  ServerConfig,
  | "quiet"
  | "idleTimeoutMs"
  | "requestTimeoutMs"
  | "maxHeaderSize"
  | "maxBodySize"
  | "headerPolicy"
>;

export interface ConnectionWorkerOptions {
  socket: ITcpSocket;
  resolver: ResourceResolver;
  config: WorkerConfig;
  logger: Logger;
  /** Called after each response has been fully written. */
  onResponse?: (request: HttpRequest, response: HttpResponse) => void;
}

export function shouldKeepAlive(
  httpVersion: HttpVersion,
  headers: ReadonlyMap<string, string>,
): boolean {
  const tokens = (headers.get("connection") ?? "")
    .toLowerCase()
    .split(",")
    .map((token) => token.trim());
  if (httpVersion === "1.0") {
    return tokens.includes("keep-alive");
  }
  return !tokens.includes("close");
}

/** Status for a parse failure the client should hear about; null closes silently. */
export function statusForParseError(err: HttpRequestParseError): HttpStatus | null {
  switch (err.code) {
    case "IDLE_TIMEOUT":
    case "REQUEST_TIMEOUT":
    case "CONNECTION_CLOSED":
    case "CONNECTION_CLOSED_INCOMPLETE":
      return null;
    case "BODY_TOO_LARGE":
      return 413;
    case "UNSUPPORTED_TRANSFER_ENCODING":
      return 501;
    case "HEADERS_TOO_LARGE":
    case "MALFORMED_REQUEST_LINE":
    case "MALFORMED_HEADER":
    case "INVALID_CONTENT_LENGTH":
      return 400;
  }
}

/**
 * Owns one accepted connection from first byte to close. Requests are read,
 * resolved and answered strictly one after another; the socket is never
 * touched by anything else while the worker runs.
 */
export class ConnectionWorker {
  private socket: ITcpSocket;
  private resolver: ResourceResolver;
  private config: WorkerConfig;
  private logger: Logger;
  private onResponse?: (request: HttpRequest, response: HttpResponse) => void;
  private parser: HttpRequestStreamParser;
  private requestCount = 0;

  constructor(options: ConnectionWorkerOptions) {
    this.socket = options.socket;
    this.resolver = options.resolver;
    this.config = options.config;
    this.logger = options.logger;
    this.onResponse = options.onResponse;
    this.parser = createHttpRequestParser(this.socket, this.parseOptions);
  }

  get label(): string {
    return `${this.socket.remoteAddress ?? "?"}:${this.socket.remotePort ?? "?"}`;
  }

  get requestsServed(): number {
    return this.requestCount;
  }

  /**
   * Serve requests until the connection ends. Never rejects; the socket is
   * closed on every exit path.
   */
  async run(): Promise<ConnectionEndReason> {
    let reason: ConnectionEndReason;
    try {
      reason = await this.serveRequests();
    } catch (err) {
      this.logger.error(`Connection ${this.label} failed:`, err);
      reason = "internal-error";
    }

    this.socket.close();
    this.logger.debug(
      `Connection ${this.label} ended (${reason}) after ${this.requestCount} request(s)`,
    );
    return reason;
  }

  private get parseOptions(): ParseHttpRequestOptions {
    return {
      idleTimeoutMs: this.config.idleTimeoutMs,
      timeoutMs: this.config.requestTimeoutMs,
      maxHeaderSize: this.config.maxHeaderSize,
      maxBodySize: this.config.maxBodySize,
      headerPolicy: this.config.headerPolicy,
    };
  }

  private async serveRequests(): Promise<ConnectionEndReason> {
    while (true) {
      let request: HttpRequest;
      try {
        request = await this.parser.readRequest(this.parseOptions);
      } catch (err) {
        return this.handleReadFailure(err);
      }

      const keepAlive = shouldKeepAlive(request.httpVersion, request.headers);
      const response = await this.resolver.resolve(request);

      try {
        await writeResponse(this.socket, response, { keepAlive });
      } catch (err) {
        if (err instanceof ConnectionIOError) {
          this.logger.debug(`Connection ${this.label}: ${err.message}`);
          return "io-error";
        }
        throw err;
      }

      this.requestCount++;
      if (!this.config.quiet) {
        this.logger.info(
          `${request.method} ${request.path} ${response.status} - ${this.socket.remoteAddress ?? "?"}`,
        );
      }
      this.onResponse?.(request, response);

      if (!keepAlive) {
        return "keep-alive-declined";
      }
    }
  }

  private async handleReadFailure(err: unknown): Promise<ConnectionEndReason> {
    if (err instanceof ConnectionIOError) {
      this.logger.debug(`Connection ${this.label}: ${err.message}`);
      return "io-error";
    }
    if (!(err instanceof HttpRequestParseError)) {
      throw err;
    }

    const status = statusForParseError(err);
    if (status === null) {
      if (err.code === "IDLE_TIMEOUT" || err.code === "REQUEST_TIMEOUT") {
        this.logger.debug(`Connection ${this.label}: ${err.message}`);
        return err.code === "IDLE_TIMEOUT" ? "idle-timeout" : "request-timeout";
      }
      return "closed";
    }

    this.logger.debug(`Connection ${this.label}: rejecting request (${err.code})`);
    const response = this.resolver.textResponse(
      status,
      `${STATUS_TEXT[status]}: ${err.message}`,
    );
    try {
      await writeResponse(this.socket, response, { keepAlive: false });
    } catch (writeErr) {
      if (!(writeErr instanceof ConnectionIOError)) {
        throw writeErr;
      }
      this.logger.debug(`Connection ${this.label}: ${writeErr.message}`);
    }
    return "protocol-error";
  }
}
