import { ConnectionIOError, toError } from "../errors.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import { type HttpResponse, STATUS_TEXT } from "./types.js";

export interface WriteResponseOptions {
  /** Outcome of the keep-alive decision; always written as `Connection`. */
  keepAlive: boolean;
}

/** `content-length` → `Content-Length`, `etag` → `Etag`. */
export function formatHeaderName(name: string): string {
  return name
    .split("-")
    .map((part) =>
      part.length > 0 ? part[0].toUpperCase() + part.slice(1) : part,
    )
    .join("-");
}

/**
 * Serialize a response to wire bytes. `Content-Length` falls back to the
 * body length when the response does not carry one (HEAD responses do).
 */
export function serializeResponse(
  response: HttpResponse,
  options: WriteResponseOptions,
): Uint8Array {
  const headers = new Map(response.headers);

  if (!headers.has("content-length")) {
    headers.set("content-length", String(response.body.length));
  }
  headers.set("connection", options.keepAlive ? "keep-alive" : "close");

  const lines: string[] = [
    `HTTP/1.1 ${response.status} ${STATUS_TEXT[response.status]}`,
  ];
  for (const [key, value] of headers) {
    lines.push(`${formatHeaderName(key)}: ${value}`);
  }
  lines.push("", ""); // \r\n\r\n

  return concat([fromString(lines.join("\r\n")), response.body]);
}

/**
 * Write a complete response and resolve with the number of bytes written.
 * Transport failures reject with ConnectionIOError.
 */
export async function writeResponse(
  socket: ITcpSocket,
  response: HttpResponse,
  options: WriteResponseOptions,
): Promise<number> {
  const bytes = serializeResponse(response, options);
  try {
    await socket.sendAndWait(bytes);
  } catch (err) {
    const cause = toError(err);
    throw new ConnectionIOError(`Response write failed: ${cause.message}`, {
      cause,
    });
  }
  return bytes.length;
}
