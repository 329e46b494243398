import type { HeaderPolicy } from "../http/types.js";

export interface ServerConfig {
  /** Port to listen on. 0 picks an ephemeral port. Default: 8080 */
  port: number;
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /** Root directory to serve. */
  root: string;
  /** Suppress per-request logging. Default: false */
  quiet: boolean;
  /** Pending-connection queue length for the listener. Default: 511 */
  listenBacklog: number;
  /** How long a kept-alive connection may sit without sending. Default: 5000ms */
  idleTimeoutMs: number;
  /** Max time allowed for receiving a full HTTP request. Default: 5000ms */
  requestTimeoutMs: number;
  /** Max size of request line plus headers. Default: 8KB */
  maxHeaderSize: number;
  /** Max accepted Content-Length. Default: 1MB */
  maxBodySize: number;
  /** How repeated request headers combine. Default: 'last-wins' */
  headerPolicy: HeaderPolicy;
  /** Value of the Server response header. Default: 'plainserve' */
  serverName: string;
}

export function defaultConfig(root: string): ServerConfig {
  return {
    port: 8080,
    host: "127.0.0.1",
    root,
    quiet: false,
    listenBacklog: 511,
    idleTimeoutMs: 5000,
    requestTimeoutMs: 5000,
    maxHeaderSize: 8 * 1024,
    maxBodySize: 1024 * 1024,
    headerPolicy: "last-wins",
    serverName: "plainserve",
  };
}
