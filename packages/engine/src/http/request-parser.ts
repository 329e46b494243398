import { ConnectionIOError } from "../errors.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import {
  concat,
  decodeLatin1,
  decodeUtf8Strict,
  indexOfByte,
} from "../utils/buffer.js";
import {
  type HeaderPolicy,
  type HttpMethod,
  type HttpRequest,
  type HttpVersion,
  isHttpMethod,
} from "./types.js";

const LF = 10;
const CR = 13;
const DEFAULT_MAX_HEADER_SIZE = 8 * 1024; // 8KB
const DEFAULT_MAX_BODY_SIZE = 1024 * 1024; // 1MB
const DEFAULT_IDLE_TIMEOUT_MS = 5000;
const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

export interface ParseHttpRequestOptions {
  maxHeaderSize?: number;
  maxBodySize?: number;
  headerPolicy?: HeaderPolicy;
  /** How long to wait for the first byte of the next request. */
  idleTimeoutMs?: number;
  /** How long a request may take once its first byte has arrived. */
  timeoutMs?: number;
}

export interface HttpRequestHead {
  method: HttpMethod;
  target: string;
  path: string;
  query: string;
  httpVersion: HttpVersion;
  headers: Map<string, string>;
  contentLength: number;
}

export type HttpRequestParseErrorCode =
  | "IDLE_TIMEOUT"
  | "REQUEST_TIMEOUT"
  | "CONNECTION_CLOSED"
  | "CONNECTION_CLOSED_INCOMPLETE"
  | "HEADERS_TOO_LARGE"
  | "MALFORMED_REQUEST_LINE"
  | "MALFORMED_HEADER"
  | "INVALID_CONTENT_LENGTH"
  | "UNSUPPORTED_TRANSFER_ENCODING"
  | "BODY_TOO_LARGE";

export class HttpRequestParseError extends Error {
  constructor(
    readonly code: HttpRequestParseErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestParseError";
  }
}

export interface ParsedRequestHead {
  head: HttpRequestHead;
  bytesConsumed: number;
}

interface RequestTarget {
  path: string;
  query: string;
}

/**
 * Resolve a request target to a path that cannot climb above "/".
 * Percent-escapes are decoded, "." and ".." segments are collapsed and a
 * trailing slash is kept. Returns null for targets that cannot be decoded.
 */
export function normalizeRequestTarget(target: string): RequestTarget | null {
  let pathAndQuery = target;
  if (/^https?:\/\//i.test(target)) {
    try {
      const url = new URL(target);
      pathAndQuery = url.pathname + url.search;
    } catch {
      return null;
    }
  }

  if (!pathAndQuery.startsWith("/")) {
    return null;
  }

  const hashIdx = pathAndQuery.indexOf("#");
  if (hashIdx !== -1) {
    pathAndQuery = pathAndQuery.slice(0, hashIdx);
  }

  const queryIdx = pathAndQuery.indexOf("?");
  const rawPath =
    queryIdx === -1 ? pathAndQuery : pathAndQuery.slice(0, queryIdx);
  const query = queryIdx === -1 ? "" : pathAndQuery.slice(queryIdx + 1);

  let decoded: string;
  try {
    decoded = decodeURIComponent(rawPath);
  } catch {
    return null;
  }
  if (decoded.includes("\0")) {
    return null;
  }

  const segments = decoded.split("/");
  const resolved: string[] = [];
  for (const seg of segments) {
    if (seg === "" || seg === ".") continue;
    if (seg === "..") {
      resolved.pop();
      continue;
    }
    resolved.push(seg);
  }

  const last = segments[segments.length - 1];
  const trailingSlash =
    resolved.length > 0 && (last === "" || last === "." || last === "..");

  return {
    path: `/${resolved.join("/")}${trailingSlash ? "/" : ""}`,
    query,
  };
}

function parseRequestLine(
  line: string,
): Omit<HttpRequestHead, "headers" | "contentLength"> {
  const parts = line.split(" ");
  if (parts.length !== 3 || parts.some((part) => part === "")) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      "Malformed request line",
    );
  }

  const [method, target, rawVersion] = parts;
  if (!isHttpMethod(method)) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      `Unrecognized method: ${method}`,
    );
  }

  let httpVersion: HttpVersion;
  if (rawVersion === "HTTP/1.1") {
    httpVersion = "1.1";
  } else if (rawVersion === "HTTP/1.0") {
    httpVersion = "1.0";
  } else {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      `Unsupported HTTP version: ${rawVersion}`,
    );
  }

  const normalized = normalizeRequestTarget(target);
  if (!normalized) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      "Malformed request target",
    );
  }

  return { method, target, httpVersion, ...normalized };
}

function lineBytes(buffer: Uint8Array, start: number, end: number): Uint8Array {
  const stop = end > start && buffer[end - 1] === CR ? end - 1 : end;
  return buffer.subarray(start, stop);
}

function readLine(buffer: Uint8Array, start: number, end: number): string {
  return decodeLatin1(lineBytes(buffer, start, end));
}

/** Targets may carry raw UTF-8 as well as percent-escapes. */
function readRequestLine(
  buffer: Uint8Array,
  start: number,
  end: number,
): string {
  const line = decodeUtf8Strict(lineBytes(buffer, start, end));
  if (line === null) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      "Request line is not valid UTF-8",
    );
  }
  return line;
}

/**
 * Try to parse a request head from the front of `buffer`.
 *
 * Returns null while more bytes are needed. The request line and each
 * header line are validated as soon as their terminator arrives, so a
 * malformed request fails without waiting for the blank line. Stray line
 * breaks before the request line count toward `maxHeaderSize`.
 */
export function parseRequestHead(
  buffer: Uint8Array,
  options?: Pick<ParseHttpRequestOptions, "maxHeaderSize" | "headerPolicy">,
): ParsedRequestHead | null {
  const maxHeaderSize = options?.maxHeaderSize ?? DEFAULT_MAX_HEADER_SIZE;
  const headerPolicy = options?.headerPolicy ?? "last-wins";

  // Stray line breaks between requests are ignored
  let start = 0;
  while (start < buffer.length) {
    if (buffer[start] === LF) {
      start += 1;
    } else if (buffer[start] === CR && buffer[start + 1] === LF) {
      start += 2;
    } else {
      break;
    }
  }

  const needMore = (): null => {
    if (buffer.length > maxHeaderSize) {
      throw new HttpRequestParseError(
        "HEADERS_TOO_LARGE",
        "Request headers too large",
      );
    }
    return null;
  };

  const requestLineEnd = indexOfByte(buffer, LF, start);
  if (requestLineEnd === -1) {
    return needMore();
  }

  const requestLine = parseRequestLine(
    readRequestLine(buffer, start, requestLineEnd),
  );

  const headers = new Map<string, string>();
  let position = requestLineEnd + 1;
  while (true) {
    const lineEnd = indexOfByte(buffer, LF, position);
    if (lineEnd === -1) {
      return needMore();
    }

    const line = readLine(buffer, position, lineEnd);
    position = lineEnd + 1;
    if (position > maxHeaderSize) {
      throw new HttpRequestParseError(
        "HEADERS_TOO_LARGE",
        "Request headers too large",
      );
    }
    if (line === "") break;

    const colonIdx = line.indexOf(":");
    const key = colonIdx === -1 ? "" : line.slice(0, colonIdx).trim();
    if (key === "") {
      throw new HttpRequestParseError(
        "MALFORMED_HEADER",
        `Malformed header line: ${line.slice(0, 64)}`,
      );
    }

    const name = key.toLowerCase();
    const value = line.slice(colonIdx + 1).trim();
    const existing = headers.get(name);
    headers.set(
      name,
      headerPolicy === "join" && existing !== undefined
        ? `${existing}, ${value}`
        : value,
    );
  }

  if (headers.has("transfer-encoding")) {
    throw new HttpRequestParseError(
      "UNSUPPORTED_TRANSFER_ENCODING",
      "Transfer-Encoding is not supported",
    );
  }

  const clHeader = headers.get("content-length");
  let contentLength = 0;
  if (clHeader !== undefined) {
    if (!/^\d+$/.test(clHeader)) {
      throw new HttpRequestParseError(
        "INVALID_CONTENT_LENGTH",
        "Invalid Content-Length",
      );
    }
    contentLength = Number(clHeader);
  }

  return {
    head: { ...requestLine, headers, contentLength },
    bytesConsumed: position,
  };
}

/**
 * Incremental request reader bound to one socket. Bytes that arrive early
 * stay buffered until the next read, so requests are handed out strictly
 * one at a time.
 *
 * At most `maxHeaderSize + maxBodySize` unread bytes are kept. Input past
 * that is dropped and the next read that needs it fails, so a client that
 * keeps sending while a response is being produced cannot grow the buffer.
 */
export class HttpRequestStreamParser {
  private chunks: Uint8Array[] = [];
  private buffered = 0;
  private overflowed = false;
  private inputEnded = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];
  private readonly maxBuffered: number;

  constructor(socket: ITcpSocket, limits?: ParseHttpRequestOptions) {
    this.maxBuffered =
      (limits?.maxHeaderSize ?? DEFAULT_MAX_HEADER_SIZE) +
      (limits?.maxBodySize ?? DEFAULT_MAX_BODY_SIZE);

    socket.onData((data) => {
      this.append(data);
      this.notifyWaiters();
    });

    // A half-closed peer sends nothing more but can still read the reply
    socket.onEnd?.(() => {
      this.inputEnded = true;
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.inputEnded = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.inputEnded = true;
      this.notifyWaiters();
    });
  }

  /** Unread bytes currently held for later requests. */
  get bufferedBytes(): number {
    return this.buffered;
  }

  async readRequest(options?: ParseHttpRequestOptions): Promise<HttpRequest> {
    const head = await this.readRequestHead(options);
    const body =
      head.contentLength > 0
        ? await this.readBody(head.contentLength, options)
        : undefined;

    return {
      method: head.method,
      target: head.target,
      path: head.path,
      query: head.query,
      httpVersion: head.httpVersion,
      headers: head.headers,
      body,
    };
  }

  async readRequestHead(
    options?: ParseHttpRequestOptions,
  ): Promise<HttpRequestHead> {
    const idleTimeoutMs = options?.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    const timeoutMs = options?.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    const idleDeadline = Date.now() + idleTimeoutMs;
    let startedAt = this.buffered > 0 ? Date.now() : null;

    while (true) {
      const parsed = parseRequestHead(this.peek(), options);
      if (parsed) {
        this.consume(parsed.bytesConsumed);
        return parsed.head;
      }

      this.throwIfSocketFailed();

      if (this.overflowed) {
        throw new HttpRequestParseError(
          "HEADERS_TOO_LARGE",
          "Too much unread request data",
        );
      }

      if (this.inputEnded) {
        if (this.buffered === 0) {
          throw new HttpRequestParseError(
            "CONNECTION_CLOSED",
            "Connection closed",
          );
        }

        throw new HttpRequestParseError(
          "CONNECTION_CLOSED_INCOMPLETE",
          "Connection closed before request was complete",
        );
      }

      if (startedAt === null && this.buffered > 0) {
        startedAt = Date.now();
      }
      const deadline =
        startedAt === null ? idleDeadline : startedAt + timeoutMs;

      const hadActivity = await this.waitForActivity(deadline - Date.now());
      if (!hadActivity) {
        if (this.buffered === 0) {
          throw new HttpRequestParseError(
            "IDLE_TIMEOUT",
            "Connection idle timed out",
          );
        }

        throw new HttpRequestParseError(
          "REQUEST_TIMEOUT",
          "Request timed out before completion",
        );
      }
    }
  }

  async readBody(
    contentLength: number,
    options?: ParseHttpRequestOptions,
  ): Promise<Uint8Array> {
    if (contentLength <= 0) {
      return new Uint8Array(0);
    }

    const maxBodySize = options?.maxBodySize ?? DEFAULT_MAX_BODY_SIZE;
    if (contentLength > maxBodySize) {
      throw new HttpRequestParseError(
        "BODY_TOO_LARGE",
        "Request body too large",
      );
    }

    const timeoutMs = options?.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    const deadline = Date.now() + timeoutMs;
    const body = new Uint8Array(contentLength);
    let position = 0;

    while (position < contentLength) {
      const chunk = this.chunks.shift();
      if (chunk) {
        const take = Math.min(contentLength - position, chunk.length);
        body.set(chunk.subarray(0, take), position);
        if (take < chunk.length) {
          this.chunks.unshift(chunk.subarray(take));
        }
        this.buffered -= take;
        position += take;
        continue;
      }

      this.throwIfSocketFailed();

      if (this.overflowed) {
        throw new HttpRequestParseError(
          "BODY_TOO_LARGE",
          "Too much unread request data",
        );
      }

      if (this.inputEnded) {
        throw new HttpRequestParseError(
          "CONNECTION_CLOSED_INCOMPLETE",
          "Connection closed before request was complete",
        );
      }

      const hadActivity = await this.waitForActivity(deadline - Date.now());
      if (!hadActivity) {
        throw new HttpRequestParseError(
          "REQUEST_TIMEOUT",
          "Request timed out before completion",
        );
      }
    }

    return body;
  }

  private append(data: Uint8Array): void {
    if (this.overflowed) return;

    const room = this.maxBuffered - this.buffered;
    if (data.length > room) {
      this.overflowed = true;
      if (room > 0) {
        this.chunks.push(data.subarray(0, room));
        this.buffered += room;
      }
      return;
    }

    this.chunks.push(data);
    this.buffered += data.length;
  }

  /** All unread bytes as one buffer. */
  private peek(): Uint8Array {
    if (this.chunks.length > 1) {
      this.chunks = [concat(this.chunks)];
    }
    return this.chunks[0] ?? new Uint8Array(0);
  }

  private consume(byteCount: number): void {
    const rest = this.peek().subarray(byteCount);
    this.chunks = rest.length > 0 ? [rest] : [];
    this.buffered = rest.length;
  }

  private throwIfSocketFailed(): void {
    if (this.socketError) {
      throw new ConnectionIOError(this.socketError.message, {
        cause: this.socketError,
      });
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

export function createHttpRequestParser(
  socket: ITcpSocket,
  options?: ParseHttpRequestOptions,
): HttpRequestStreamParser {
  return new HttpRequestStreamParser(socket, options);
}

/**
 * Parse a single HTTP/1.x request from a TCP socket stream.
 * Returns a promise that resolves with the parsed request.
 */
export function parseHttpRequest(
  socket: ITcpSocket,
  options?: ParseHttpRequestOptions,
): Promise<HttpRequest> {
  return createHttpRequestParser(socket, options).readRequest(options);
}
