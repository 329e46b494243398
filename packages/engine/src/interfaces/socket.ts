/**
 * Abstract Socket Interfaces
 *
 * These keep the protocol engine independent of the runtime that owns the
 * actual sockets. The Node adapter and the in-memory test factory both
 * implement them.
 */

export interface ITcpSocket {
  /**
   * Send data and resolve once it has been handed to the transport without
   * backpressure. Rejects when the peer is gone or the write fails.
   */
  sendAndWait(data: Uint8Array): Promise<void>;

  /** Register a callback for incoming data. */
  onData(cb: (data: Uint8Array) => void): void;

  /**
   * Register a callback for the peer finishing its side of the stream. The
   * socket stays writable until `close()`.
   */
  onEnd?(cb: () => void): void;

  /** Register a callback for connection close. */
  onClose(cb: (hadError: boolean) => void): void;

  /** Register a callback for errors. */
  onError(cb: (err: Error) => void): void;

  /** Close the connection. Safe to call more than once. */
  close(): void;

  /** Remote peer address. */
  remoteAddress?: string;

  /** Remote peer port. */
  remotePort?: number;
}

export interface ListenOptions {
  port: number;
  host?: string;
  /** Pending-connection queue length handed to the OS. */
  backlog?: number;
}

export interface ITcpServer {
  /** Start listening; the callback fires once the port is bound. */
  listen(options: ListenOptions, callback?: () => void): void;

  /** Get the address the server is listening on. */
  address(): { port: number } | null;

  /** Register a callback for incoming connections. */
  on(event: "connection", cb: (socket: unknown) => void): void;

  /** Register a callback for server errors (bind or accept failures). */
  on(event: "error", cb: (err: Error) => void): void;

  /** Stop accepting; the callback fires once the listener is closed. */
  close(callback?: () => void): void;
}

export interface ISocketFactory {
  /** Create a TCP server. */
  createTcpServer(): ITcpServer;

  /** Wrap a native socket into ITcpSocket. */
  wrapTcpSocket(socket: unknown): ITcpSocket;
}
