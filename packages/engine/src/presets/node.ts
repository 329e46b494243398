import { NodeFileSystem, NodeSocketFactory } from "../adapters/node/index.js";
import type { ServerConfig } from "../config/server-config.js";
import type { Logger } from "../logging/logger.js";
import { WebServer } from "../server/web-server.js";

export interface NodeServerOptions {
  config: ServerConfig;
  logger?: Logger;
}

export function createNodeServer(options: NodeServerOptions): WebServer {
  const socketFactory = new NodeSocketFactory();
  const fileSystem = new NodeFileSystem();
  return new WebServer({
    socketFactory,
    fileSystem,
    config: options.config,
    logger: options.logger,
  });
}

/**
 * Bind and serve until the server is stopped. Rejects only if binding
 * fails; `onStarted` receives the running server and its bound port.
 */
export async function serve(
  options: NodeServerOptions & {
    onStarted?: (server: WebServer, port: number) => void;
  },
): Promise<void> {
  const server = createNodeServer(options);
  const closed = new Promise<void>((resolve) => {
    server.once("close", () => resolve());
  });

  const port = await server.start();
  options.onStarted?.(server, port);
  await closed;
}
