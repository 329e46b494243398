import * as path from "node:path";
import {
  defaultConfig,
  isLogLevel,
  type LogLevel,
  type ServerConfig,
} from "@plainserve/engine";

export const VERSION = "0.1.0";

export interface CliOptions {
  root: string;
  port: number;
  host: string;
  backlog?: number;
  idleTimeoutMs?: number;
  requestTimeoutMs?: number;
  maxHeaderSize?: number;
  joinHeaders: boolean;
  logLevel: LogLevel;
  quiet: boolean;
}

export type CliCommand =
  | { kind: "serve"; options: CliOptions }
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "error"; message: string };

type Env = Record<string, string | undefined>;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function parseInteger(
  flag: string,
  raw: string | undefined,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    throw new UsageError(`Invalid value for ${flag}: ${raw ?? "(missing)"}`);
  }
  const value = Number(raw);
  if (value < min || value > max) {
    throw new UsageError(`${flag} must be between ${min} and ${max}`);
  }
  return value;
}

function parseLogLevel(flag: string, raw: string | undefined): LogLevel {
  if (raw === undefined || !isLogLevel(raw)) {
    throw new UsageError(
      `Invalid value for ${flag}: ${raw ?? "(missing)"} (expected debug, info, warn or error)`,
    );
  }
  return raw;
}

function requireValue(flag: string, raw: string | undefined): string {
  if (raw === undefined || raw.startsWith("-")) {
    throw new UsageError(`Missing value for ${flag}`);
  }
  return raw;
}

/**
 * Parse command line flags. Environment variables supply defaults that
 * flags override.
 */
export function parseArgs(args: string[], env: Env = {}): CliCommand {
  try {
    return parseCommand(args, env);
  } catch (err) {
    if (err instanceof UsageError) {
      return { kind: "error", message: err.message };
    }
    throw err;
  }
}

function parseCommand(args: string[], env: Env): CliCommand {
  const options: CliOptions = {
    root: env.PLAINSERVE_ROOT ?? ".",
    port:
      env.PLAINSERVE_PORT !== undefined
        ? parseInteger("PLAINSERVE_PORT", env.PLAINSERVE_PORT, 0, 65535)
        : 8080,
    host: env.PLAINSERVE_HOST ?? "127.0.0.1",
    joinHeaders: false,
    logLevel:
      env.PLAINSERVE_LOG_LEVEL !== undefined
        ? parseLogLevel("PLAINSERVE_LOG_LEVEL", env.PLAINSERVE_LOG_LEVEL)
        : "info",
    quiet: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--root" || arg === "-r") {
      options.root = requireValue(arg, args[++i]);
    } else if (arg === "--port" || arg === "-p") {
      options.port = parseInteger(arg, args[++i], 0, 65535);
    } else if (arg === "--host" || arg === "-H") {
      options.host = requireValue(arg, args[++i]);
    } else if (arg === "--backlog" || arg === "-w") {
      options.backlog = parseInteger(arg, args[++i], 1);
    } else if (arg === "--idle-timeout") {
      options.idleTimeoutMs = parseInteger(arg, args[++i], 1);
    } else if (arg === "--request-timeout") {
      options.requestTimeoutMs = parseInteger(arg, args[++i], 1);
    } else if (arg === "--max-header-size") {
      options.maxHeaderSize = parseInteger(arg, args[++i], 64);
    } else if (arg === "--join-headers") {
      options.joinHeaders = true;
    } else if (arg === "--log-level") {
      options.logLevel = parseLogLevel(arg, args[++i]);
    } else if (arg === "--quiet" || arg === "-q") {
      options.quiet = true;
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else if (!arg.startsWith("-")) {
      options.root = arg;
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
    i++;
  }

  return { kind: "serve", options };
}

export function buildConfig(options: CliOptions, cwd: string): ServerConfig {
  const defaults = defaultConfig(path.resolve(cwd, options.root));
  return {
    ...defaults,
    port: options.port,
    host: options.host,
    quiet: options.quiet,
    listenBacklog: options.backlog ?? defaults.listenBacklog,
    idleTimeoutMs: options.idleTimeoutMs ?? defaults.idleTimeoutMs,
    requestTimeoutMs: options.requestTimeoutMs ?? defaults.requestTimeoutMs,
    maxHeaderSize: options.maxHeaderSize ?? defaults.maxHeaderSize,
    headerPolicy: options.joinHeaders ? "join" : defaults.headerPolicy,
  };
}

export function helpText(): string {
  return `
plainserve - serve static files over HTTP/1.x

Usage: plainserve [directory] [options]

Options:
  --root, -r <dir>          Directory to serve (default: .)
  --port, -p <port>         Port to listen on, 0 for any (default: 8080)
  --host, -H <host>         Host to bind (default: 127.0.0.1)
  --backlog, -w <n>         Pending-connection queue length (default: 511)
  --idle-timeout <ms>       Close idle kept-alive connections (default: 5000)
  --request-timeout <ms>    Limit time to receive a request (default: 5000)
  --max-header-size <bytes> Limit request line plus headers (default: 8192)
  --join-headers            Join repeated request headers instead of keeping the last
  --log-level <level>       debug, info, warn or error (default: info)
  --quiet, -q               Suppress request logging
  --version, -v             Show version
  --help, -h                Show this help

Environment:
  PLAINSERVE_ROOT, PLAINSERVE_PORT, PLAINSERVE_HOST, PLAINSERVE_LOG_LEVEL
`;
}
