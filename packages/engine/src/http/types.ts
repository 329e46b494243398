export const HTTP_METHODS = [
  "GET",
  "HEAD",
  "POST",
  "PUT",
  "DELETE",
  "OPTIONS",
  "PATCH",
  "TRACE",
  "CONNECT",
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type HttpVersion = "1.0" | "1.1";

/**
 * How repeated request headers are combined.
 * `last-wins` keeps the final value, `join` concatenates with ", ".
 */
export type HeaderPolicy = "last-wins" | "join";

export interface HttpRequest {
  readonly method: HttpMethod;
  /** Request target exactly as it appeared on the request line. */
  readonly target: string;
  /** Decoded, dot-segment-free path. Always starts with "/". */
  readonly path: string;
  readonly query: string;
  readonly httpVersion: HttpVersion;
  /** Lower-cased header names. */
  readonly headers: ReadonlyMap<string, string>;
  readonly body?: Uint8Array;
}

export const STATUS_TEXT = {
  200: "OK",
  400: "Bad Request",
  404: "Not Found",
  405: "Method Not Allowed",
  413: "Content Too Large",
  500: "Internal Server Error",
  501: "Not Implemented",
} as const;

export type HttpStatus = keyof typeof STATUS_TEXT;

export interface HttpResponse {
  readonly status: HttpStatus;
  /** Lower-cased header names, written in insertion order. */
  readonly headers: ReadonlyMap<string, string>;
  readonly body: Uint8Array;
}

export function isHttpMethod(token: string): token is HttpMethod {
  return HTTP_METHODS.some((method) => method === token);
}
