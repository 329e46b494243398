import type { ServerConfig } from "../config/server-config.js";
import type { ContentSource } from "../content/content-source.js";
import { FileSystemContentSource } from "../content/filesystem-content-source.js";
import type { HttpMethod, HttpStatus } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type { ISocketFactory, ITcpServer, ITcpSocket } from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";
import { ConnectionWorker } from "./connection-worker.js";
import { ResourceResolver } from "./resource-resolver.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  config: ServerConfig;
  /** Files under `config.root` are served through this file system... */
  fileSystem?: IFileSystem;
  /** ...unless a content source is supplied directly. */
  contentSource?: ContentSource;
  logger?: Logger;
}

export interface ServerStats {
  activeConnections: number;
  totalConnections: number;
  totalRequests: number;
}

export type WebServerEvents = {
  listening: [port: number];
  connection: [remoteAddress: string];
  request: [method: HttpMethod, path: string, status: HttpStatus];
  error: [err: Error];
  close: [];
};

/**
 * Listener and dispatcher: binds the port and gives every accepted socket
 * its own ConnectionWorker. There is no pool and no connection cap.
 */
export class WebServer extends EventEmitter<WebServerEvents> {
  private socketFactory: ISocketFactory;
  private config: ServerConfig;
  private logger: Logger;
  private resolver: ResourceResolver;
  private tcpServer: ITcpServer | null = null;
  private activeConnections: Set<ITcpSocket> = new Set();
  // Only touched from dispatcher callbacks on the event loop
  private counters = { totalConnections: 0, totalRequests: 0 };

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();

    const source = options.contentSource ?? this.fileContentSource(options);
    this.resolver = new ResourceResolver({
      source,
      serverName: this.config.serverName,
      logger: this.logger,
    });
  }

  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        let socket: ITcpSocket;
        try {
          socket = this.socketFactory.wrapTcpSocket(rawSocket);
        } catch (err) {
          this.logger.error("Failed to accept connection:", err);
          return;
        }
        this.dispatch(socket);
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(err);
          return;
        }

        // Accept failures are not fatal; the listener keeps running
        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(
        {
          port: this.config.port,
          host: this.config.host,
          backlog: this.config.listenBacklog,
        },
        () => {
          if (settled) return;
          settled = true;
          const addr = server.address();
          const port = addr?.port ?? this.config.port;
          this.logger.debug(`Listening on ${this.config.host}:${port}`);
          this.emit("listening", port);
          resolve(port);
        },
      );
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.tcpServer;
      this.tcpServer = null;

      // Close all active connections
      for (const socket of this.activeConnections) {
        socket.close();
      }
      this.activeConnections.clear();

      if (!server) {
        this.emit("close");
        resolve();
        return;
      }

      server.close(() => {
        this.emit("close");
        resolve();
      });
    });
  }

  get listening(): boolean {
    return this.tcpServer !== null;
  }

  stats(): ServerStats {
    return {
      activeConnections: this.activeConnections.size,
      ...this.counters,
    };
  }

  private fileContentSource(options: WebServerOptions): ContentSource {
    if (!options.fileSystem) {
      throw new Error("WebServer needs either a fileSystem or a contentSource");
    }
    return new FileSystemContentSource({
      root: this.config.root,
      fs: options.fileSystem,
    });
  }

  private dispatch(socket: ITcpSocket): void {
    this.activeConnections.add(socket);
    this.counters.totalConnections++;
    const remoteAddress = socket.remoteAddress ?? "?";
    this.emit("connection", remoteAddress);

    const worker = new ConnectionWorker({
      socket,
      resolver: this.resolver,
      config: this.config,
      logger: this.logger,
      onResponse: (request, response) => {
        this.counters.totalRequests++;
        this.emit("request", request.method, request.path, response.status);
      },
    });

    this.logger.debug(`Connection ${worker.label} accepted`);
    worker.run().then(
      () => {
        this.activeConnections.delete(socket);
      },
      (err: unknown) => {
        this.activeConnections.delete(socket);
        this.logger.error(`Connection ${worker.label} worker crashed:`, err);
      },
    );
  }
}
