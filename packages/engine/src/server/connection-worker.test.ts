import { describe, expect, it, vi } from "vitest";
import { defaultConfig, type ServerConfig } from "../config/server-config.js";
import type { ContentSource } from "../content/content-source.js";
import {
  HttpRequestParseError,
  type HttpRequestParseErrorCode,
} from "../http/request-parser.js";
import {
  parseHttpResponse,
  parseHttpResponses,
} from "../http/response-parser.js";
import type { HttpStatus, HttpVersion } from "../http/types.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import { concat, decodeToString, fromString } from "../utils/buffer.js";
import {
  ConnectionWorker,
  shouldKeepAlive,
  statusForParseError,
} from "./connection-worker.js";
import { ResourceResolver } from "./resource-resolver.js";

const files = new Map([["/a.txt", fromString("alpha")]]);

const source: ContentSource = {
  async lookup(path) {
    return files.get(path) ?? null;
  },
};

interface ScriptOptions {
  /** Report end-of-stream shortly after the input is delivered. */
  endInput?: boolean;
  writeError?: Error;
}

function scriptedSocket(input: string, options: ScriptOptions = {}) {
  const chunks: Uint8Array[] = [];
  const close = vi.fn();
  const socket: ITcpSocket = {
    remoteAddress: "10.0.0.7",
    remotePort: 5555,
    async sendAndWait(data) {
      if (options.writeError) {
        throw options.writeError;
      }
      chunks.push(data.slice());
    },
    onData(cb) {
      queueMicrotask(() => cb(fromString(input)));
    },
    onClose(cb) {
      if (options.endInput) {
        setTimeout(() => cb(false), 5);
      }
    },
    onError() {},
    close,
  };
  return { socket, close, written: () => concat(chunks) };
}

function createWorker(
  socket: ITcpSocket,
  overrides: Partial<ServerConfig> = {},
  logger: Logger = silentLogger(),
  onResponse?: ConstructorParameters<typeof ConnectionWorker>[0]["onResponse"],
) {
  const config: ServerConfig = {
    ...defaultConfig("/site"),
    quiet: true,
    ...overrides,
  };
  return new ConnectionWorker({
    socket,
    resolver: new ResourceResolver({ source, serverName: "plainserve" }),
    config,
    logger,
    onResponse,
  });
}

const keepAliveCases: Array<[HttpVersion, string | undefined, boolean]> = [
  ["1.1", undefined, true],
  ["1.1", "close", false],
  ["1.1", "Close", false],
  ["1.1", "keep-alive", true],
  ["1.1", "upgrade, close", false],
  ["1.0", undefined, false],
  ["1.0", "keep-alive", true],
  ["1.0", "Keep-Alive", true],
  ["1.0", "close", false],
];

const parseErrorCases: Array<[HttpRequestParseErrorCode, HttpStatus | null]> = [
  ["IDLE_TIMEOUT", null],
  ["REQUEST_TIMEOUT", null],
  ["CONNECTION_CLOSED", null],
  ["CONNECTION_CLOSED_INCOMPLETE", null],
  ["HEADERS_TOO_LARGE", 400],
  ["MALFORMED_REQUEST_LINE", 400],
  ["MALFORMED_HEADER", 400],
  ["INVALID_CONTENT_LENGTH", 400],
  ["BODY_TOO_LARGE", 413],
  ["UNSUPPORTED_TRANSFER_ENCODING", 501],
];

describe("shouldKeepAlive", () => {
  it.each(keepAliveCases)(
    "HTTP/%s with Connection %s keeps alive: %s",
    (version, connection, expected) => {
      const headers = new Map<string, string>();
      if (connection !== undefined) {
        headers.set("connection", connection);
      }
      expect(shouldKeepAlive(version, headers)).toBe(expected);
    },
  );
});

describe("statusForParseError", () => {
  it.each(parseErrorCases)("maps %s to %s", (code, status) => {
    expect(statusForParseError(new HttpRequestParseError(code, "x"))).toBe(
      status,
    );
  });
});

describe("ConnectionWorker", () => {
  it("answers pipelined requests in order until Connection: close", async () => {
    const { socket, close, written } = scriptedSocket(
      "GET /a.txt HTTP/1.1\r\n\r\nGET /missing HTTP/1.1\r\nConnection: close\r\n\r\n",
    );
    const worker = createWorker(socket);

    const reason = await worker.run();

    expect(reason).toBe("keep-alive-declined");
    expect(worker.requestsServed).toBe(2);
    expect(close).toHaveBeenCalledTimes(1);

    const [first, second] = parseHttpResponses(written());
    expect(first.status).toBe(200);
    expect(decodeToString(first.body)).toBe("alpha");
    expect(first.headers.get("connection")).toBe("keep-alive");
    expect(second.status).toBe(404);
    expect(second.headers.get("connection")).toBe("close");
  });

  it("closes HTTP/1.0 connections after one response", async () => {
    const { socket, written } = scriptedSocket(
      "GET /a.txt HTTP/1.0\r\n\r\nGET /a.txt HTTP/1.0\r\n\r\n",
    );
    const worker = createWorker(socket);

    expect(await worker.run()).toBe("keep-alive-declined");
    expect(worker.requestsServed).toBe(1);
    expect(parseHttpResponses(written())).toHaveLength(1);
  });

  it("ends quietly when the client hangs up between requests", async () => {
    const { socket, close } = scriptedSocket("GET /a.txt HTTP/1.1\r\n\r\n", {
      endInput: true,
    });
    const worker = createWorker(socket);

    expect(await worker.run()).toBe("closed");
    expect(worker.requestsServed).toBe(1);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("drops idle connections without writing", async () => {
    const { socket, close, written } = scriptedSocket("");
    const worker = createWorker(socket, { idleTimeoutMs: 20 });

    expect(await worker.run()).toBe("idle-timeout");
    expect(written().length).toBe(0);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("drops requests that never finish without writing", async () => {
    const { socket, written } = scriptedSocket("GET /a.txt HTTP/1.1\r\n");
    const worker = createWorker(socket, { requestTimeoutMs: 20 });

    expect(await worker.run()).toBe("request-timeout");
    expect(written().length).toBe(0);
  });

  it("answers a malformed request with 400 and closes", async () => {
    const { socket, close, written } = scriptedSocket("GET /\r\n");
    const worker = createWorker(socket);

    expect(await worker.run()).toBe("protocol-error");
    expect(close).toHaveBeenCalledTimes(1);

    const response = parseHttpResponse(written());
    expect(response.status).toBe(400);
    expect(response.headers.get("connection")).toBe("close");
    expect(decodeToString(response.body)).toBe(
      "Bad Request: Malformed request line\n",
    );
  });

  it("answers an oversized body with 413", async () => {
    const { socket, written } = scriptedSocket(
      "POST /a.txt HTTP/1.1\r\nContent-Length: 5000\r\n\r\n",
    );
    const worker = createWorker(socket, { maxBodySize: 100 });

    expect(await worker.run()).toBe("protocol-error");

    const response = parseHttpResponse(written());
    expect(response.status).toBe(413);
    expect(decodeToString(response.body)).toBe(
      "Content Too Large: Request body too large\n",
    );
  });

  it("answers Transfer-Encoding with 501", async () => {
    const { socket, written } = scriptedSocket(
      "POST /a.txt HTTP/1.1\r\nTransfer-Encoding: chunked\r\n\r\n",
    );
    const worker = createWorker(socket);

    await worker.run();

    const response = parseHttpResponse(written());
    expect(response.status).toBe(501);
    expect(decodeToString(response.body)).toBe(
      "Not Implemented: Transfer-Encoding is not supported\n",
    );
  });

  it("stops on a failed write and still closes the socket", async () => {
    const { socket, close } = scriptedSocket("GET /a.txt HTTP/1.1\r\n\r\n", {
      writeError: new Error("EPIPE"),
    });
    const worker = createWorker(socket);

    expect(await worker.run()).toBe("io-error");
    expect(worker.requestsServed).toBe(0);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("logs one line per response unless quiet", async () => {
    const info = vi.fn();
    const logger = { ...silentLogger(), info };
    const { socket } = scriptedSocket(
      "GET /a.txt HTTP/1.1\r\nConnection: close\r\n\r\n",
    );

    await createWorker(socket, { quiet: false }, logger).run();

    expect(info).toHaveBeenCalledWith("GET /a.txt 200 - 10.0.0.7");
  });

  it("stays silent at info level when quiet", async () => {
    const info = vi.fn();
    const logger = { ...silentLogger(), info };
    const { socket } = scriptedSocket(
      "GET /a.txt HTTP/1.1\r\nConnection: close\r\n\r\n",
    );

    await createWorker(socket, { quiet: true }, logger).run();

    expect(info).not.toHaveBeenCalled();
  });

  it("reports each written response", async () => {
    const onResponse = vi.fn();
    const { socket } = scriptedSocket(
      "HEAD /a.txt HTTP/1.1\r\nConnection: close\r\n\r\n",
    );

    await createWorker(socket, {}, silentLogger(), onResponse).run();

    expect(onResponse).toHaveBeenCalledTimes(1);
    const [request, response] = onResponse.mock.calls[0];
    expect(request.method).toBe("HEAD");
    expect(request.path).toBe("/a.txt");
    expect(response.status).toBe(200);
  });

  it("caps input that arrives while a response is pending", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const lookup = vi.fn(async (path: string) => {
      await gate;
      return files.get(path) ?? null;
    });

    let deliver: (data: Uint8Array) => void = () => {};
    const chunks: Uint8Array[] = [];
    const socket: ITcpSocket = {
      async sendAndWait(data) {
        chunks.push(data.slice());
      },
      onData(cb) {
        deliver = cb;
      },
      onClose() {},
      onError() {},
      close: vi.fn(),
    };

    const worker = new ConnectionWorker({
      socket,
      resolver: new ResourceResolver({
        source: { lookup },
        serverName: "plainserve",
      }),
      config: {
        ...defaultConfig("/site"),
        quiet: true,
        maxHeaderSize: 256,
        maxBodySize: 1024,
      },
      logger: silentLogger(),
    });

    const finished = worker.run();
    deliver(fromString("GET /a.txt HTTP/1.1\r\n\r\n"));
    await vi.waitFor(() => expect(lookup).toHaveBeenCalledTimes(1));

    for (let i = 0; i < 256; i++) {
      deliver(fromString("x".repeat(1024)));
    }
    release();

    expect(await finished).toBe("protocol-error");
    const [first, second] = parseHttpResponses(concat(chunks));
    expect(first.status).toBe(200);
    expect(decodeToString(first.body)).toBe("alpha");
    expect(second.status).toBe(400);
    expect(decodeToString(second.body)).toBe(
      "Bad Request: Request headers too large\n",
    );
  });

  it("labels the connection by peer address", () => {
    const { socket } = scriptedSocket("");
    expect(createWorker(socket).label).toBe("10.0.0.7:5555");
  });
});
