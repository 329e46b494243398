import * as net from "node:net";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
  ListenOptions,
} from "../../interfaces/socket.js";

// How long a closing socket keeps reading before it is destroyed
const CLOSE_LINGER_MS = 2000;

export class NodeTcpSocket implements ITcpSocket {
  private closing = false;

  constructor(private socket: net.Socket) {}

  get remoteAddress(): string | undefined {
    return this.socket.remoteAddress;
  }

  get remotePort(): number | undefined {
    return this.socket.remotePort;
  }

  sendAndWait(data: Uint8Array): Promise<void> {
    if (this.socket.destroyed || !this.socket.writable) {
      return Promise.reject(new Error("Socket is not writable"));
    }

    return new Promise((resolve, reject) => {
      let settled = false;

      const done = () => {
        if (settled) return;
        settled = true;
        cleanup();
        resolve();
      };

      const fail = (err: Error) => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(err);
      };

      const onDrain = () => done();
      const onClose = () => fail(new Error("Socket closed during write"));
      const onError = (err: Error) => fail(err);

      const cleanup = () => {
        this.socket.off("drain", onDrain);
        this.socket.off("close", onClose);
        this.socket.off("error", onError);
      };

      this.socket.once("close", onClose);
      this.socket.once("error", onError);

      try {
        // The callback reports the flush result, including EPIPE/ECONNRESET
        const accepted = this.socket.write(data, (err) => {
          if (err) fail(err);
        });
        if (accepted) {
          done();
        } else {
          this.socket.once("drain", onDrain);
        }
      } catch (err) {
        fail(err instanceof Error ? err : new Error(String(err)));
      }
    });
  }

  onData(cb: (data: Uint8Array) => void): void {
    this.socket.on("data", (data: Buffer) => {
      cb(new Uint8Array(data));
    });
  }

  onEnd(cb: () => void): void {
    this.socket.on("end", cb);
  }

  onClose(cb: (hadError: boolean) => void): void {
    this.socket.on("close", cb);
  }

  onError(cb: (err: Error) => void): void {
    this.socket.on("error", cb);
  }

  /**
   * Send FIN after the last response and keep draining input until the peer
   * hangs up; unread input at destroy time makes the kernel send a reset.
   */
  close(): void {
    if (this.closing || this.socket.destroyed) return;
    this.closing = true;

    const linger = setTimeout(() => this.socket.destroy(), CLOSE_LINGER_MS);
    linger.unref();
    this.socket.once("close", () => clearTimeout(linger));
    this.socket.resume();
    this.socket.end();
  }
}

export class NodeTcpServer implements ITcpServer {
  private server: net.Server;

  constructor() {
    // Half-closed clients still get their response
    this.server = net.createServer({ allowHalfOpen: true });
  }

  listen(options: ListenOptions, callback?: () => void): void {
    this.server.listen(
      { port: options.port, host: options.host, backlog: options.backlog },
      callback,
    );
  }

  address(): { port: number } | null {
    const addr = this.server.address();
    if (addr && typeof addr === "object" && "port" in addr) {
      return { port: addr.port };
    }
    return null;
  }

  on(event: "connection", cb: (socket: unknown) => void): void;
  on(event: "error", cb: (err: Error) => void): void;
  on(
    event: "connection" | "error",
    cb: ((socket: unknown) => void) | ((err: Error) => void),
  ): void {
    this.server.on(event, cb);
  }

  close(callback?: () => void): void {
    this.server.close(() => callback?.());
  }
}

export class NodeSocketFactory implements ISocketFactory {
  createTcpServer(): ITcpServer {
    return new NodeTcpServer();
  }

  wrapTcpSocket(socket: unknown): ITcpSocket {
    if (!(socket instanceof net.Socket)) {
      throw new Error("Expected a Node net.Socket");
    }
    return new NodeTcpSocket(socket);
  }
}
