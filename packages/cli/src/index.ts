#!/usr/bin/env node
import * as fs from "node:fs/promises";
import {
  basicLogger,
  filteredLogger,
  prefixedLogger,
  serve,
  type WebServer,
} from "@plainserve/engine";
import { buildConfig, helpText, parseArgs, VERSION } from "./args.js";

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

async function main(): Promise<void> {
  const command = parseArgs(process.argv.slice(2), process.env);
  switch (command.kind) {
    case "help":
      console.log(helpText());
      return;
    case "version":
      console.log(VERSION);
      return;
    case "error":
      console.error(command.message);
      console.error(helpText());
      process.exit(1);
  }

  const config = buildConfig(command.options, process.cwd());
  if (!(await isDirectory(config.root))) {
    console.error(`Not a directory: ${config.root}`);
    process.exit(1);
  }

  const logger = filteredLogger(
    command.options.logLevel,
    prefixedLogger("plainserve", basicLogger()),
  );

  const onStarted = (server: WebServer, port: number) => {
    const shownHost = config.host === "0.0.0.0" ? "localhost" : config.host;
    console.log(`\n  plainserve serving ${config.root}\n`);
    console.log(`  Local:   http://${shownHost}:${port}`);
    if (config.host === "0.0.0.0") {
      console.log(`  Network: http://0.0.0.0:${port}`);
    }
    console.log();

    const shutdown = () => {
      console.log("\nShutting down...");
      server.stop().catch((err: unknown) => {
        logger.error("Error during shutdown:", err);
        process.exitCode = 1;
      });
    };

    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  };

  await serve({ config, logger, onStarted });
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
