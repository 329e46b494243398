import { decodeLatin1 } from "../utils/buffer.js";

const CRLF_CRLF = new Uint8Array([13, 10, 13, 10]); // \r\n\r\n

export interface ParsedHttpResponse {
  httpVersion: string;
  status: number;
  statusText: string;
  headers: Map<string, string>;
  body: Uint8Array;
}

export interface ParseHttpResponseOptions {
  /** Responses to HEAD carry a Content-Length but no body bytes. */
  headRequest?: boolean;
}

function findSequence(
  buffer: Uint8Array,
  sequence: Uint8Array,
  fromIndex: number,
): number {
  outer: for (let i = fromIndex; i <= buffer.length - sequence.length; i++) {
    for (let j = 0; j < sequence.length; j++) {
      if (buffer[i + j] !== sequence[j]) continue outer;
    }
    return i;
  }
  return -1;
}

/**
 * Parse the response starting at `offset`; `next` is the offset just past
 * its body. Throws when the bytes do not hold a complete response.
 */
export function readHttpResponse(
  raw: Uint8Array,
  offset: number,
  options?: ParseHttpResponseOptions,
): { response: ParsedHttpResponse; next: number } {
  const splitAt = findSequence(raw, CRLF_CRLF, offset);
  if (splitAt === -1) {
    throw new Error("Invalid HTTP response: missing header separator");
  }

  const lines = decodeLatin1(raw.subarray(offset, splitAt)).split("\r\n");
  const statusLine = lines[0];
  const match = /^HTTP\/(\d\.\d) (\d{3}) ?(.*)$/.exec(statusLine);
  if (!match) {
    throw new Error(`Invalid status line: ${statusLine}`);
  }

  const headers = new Map<string, string>();
  for (let i = 1; i < lines.length; i++) {
    const colon = lines[i].indexOf(":");
    if (colon === -1) continue;
    const key = lines[i].slice(0, colon).trim().toLowerCase();
    const value = lines[i].slice(colon + 1).trim();
    headers.set(key, value);
  }

  const bodyStart = splitAt + CRLF_CRLF.length;
  const clHeader = headers.get("content-length");
  let bodyEnd = raw.length;
  if (options?.headRequest) {
    bodyEnd = bodyStart;
  } else if (clHeader !== undefined) {
    const contentLength = Number.parseInt(clHeader, 10);
    if (Number.isNaN(contentLength) || contentLength < 0) {
      throw new Error(`Invalid Content-Length: ${clHeader}`);
    }
    bodyEnd = bodyStart + contentLength;
    if (bodyEnd > raw.length) {
      throw new Error("Invalid HTTP response: truncated body");
    }
  }

  return {
    response: {
      httpVersion: match[1],
      status: Number(match[2]),
      statusText: match[3],
      headers,
      body: raw.slice(bodyStart, bodyEnd),
    },
    next: bodyEnd,
  };
}

/** Parse one response from wire bytes (client side of the writer). */
export function parseHttpResponse(
  raw: Uint8Array,
  options?: ParseHttpResponseOptions,
): ParsedHttpResponse {
  return readHttpResponse(raw, 0, options).response;
}

/** Parse every response written back-to-back on a kept-alive connection. */
export function parseHttpResponses(
  raw: Uint8Array,
  options?: ParseHttpResponseOptions,
): ParsedHttpResponse[] {
  const responses: ParsedHttpResponse[] = [];
  let offset = 0;
  while (offset < raw.length) {
    const { response, next } = readHttpResponse(raw, offset, options);
    responses.push(response);
    offset = next;
  }
  return responses;
}
