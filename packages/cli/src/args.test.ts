import { describe, expect, it } from "vitest";
import { buildConfig, type CliOptions, helpText, parseArgs } from "./args.js";

function serveOptions(
  args: string[],
  env: Record<string, string | undefined> = {},
): CliOptions {
  const command = parseArgs(args, env);
  if (command.kind !== "serve") {
    throw new Error(`expected serve, got ${command.kind}`);
  }
  return command.options;
}

describe("parseArgs", () => {
  it("uses defaults with no arguments", () => {
    expect(serveOptions([])).toEqual({
      root: ".",
      port: 8080,
      host: "127.0.0.1",
      joinHeaders: false,
      logLevel: "info",
      quiet: false,
    });
  });

  it("takes the root as a positional argument or flag", () => {
    expect(serveOptions(["public"]).root).toBe("public");
    expect(serveOptions(["-r", "site"]).root).toBe("site");
    expect(serveOptions(["--root", "www"]).root).toBe("www");
  });

  it("parses every serving flag", () => {
    expect(
      serveOptions([
        "-p",
        "0",
        "-H",
        "0.0.0.0",
        "-w",
        "64",
        "--idle-timeout",
        "1500",
        "--request-timeout",
        "2500",
        "--max-header-size",
        "4096",
        "--join-headers",
        "--log-level",
        "debug",
        "-q",
      ]),
    ).toEqual({
      root: ".",
      port: 0,
      host: "0.0.0.0",
      backlog: 64,
      idleTimeoutMs: 1500,
      requestTimeoutMs: 2500,
      maxHeaderSize: 4096,
      joinHeaders: true,
      logLevel: "debug",
      quiet: true,
    });
  });

  it("falls back to environment variables", () => {
    const options = serveOptions([], {
      PLAINSERVE_ROOT: "/srv/www",
      PLAINSERVE_PORT: "9000",
      PLAINSERVE_HOST: "::1",
      PLAINSERVE_LOG_LEVEL: "warn",
    });

    expect(options.root).toBe("/srv/www");
    expect(options.port).toBe(9000);
    expect(options.host).toBe("::1");
    expect(options.logLevel).toBe("warn");
  });

  it("lets flags override the environment", () => {
    const options = serveOptions(["--port", "7000"], {
      PLAINSERVE_PORT: "9000",
    });
    expect(options.port).toBe(7000);
  });

  it.each([
    [["--port", "http"], "Invalid value for --port: http"],
    [["--port"], "Invalid value for --port: (missing)"],
    [["-p", "70000"], "-p must be between 0 and 65535"],
    [["-w", "0"], `-w must be between 1 and ${Number.MAX_SAFE_INTEGER}`],
    [["--host", "--quiet"], "Missing value for --host"],
    [["--bogus"], "Unknown option: --bogus"],
  ])("rejects %j", (args, message) => {
    expect(parseArgs(args)).toEqual({ kind: "error", message });
  });

  it("rejects an invalid log level from the environment", () => {
    expect(parseArgs([], { PLAINSERVE_LOG_LEVEL: "loud" })).toEqual({
      kind: "error",
      message:
        "Invalid value for PLAINSERVE_LOG_LEVEL: loud (expected debug, info, warn or error)",
    });
  });

  it("recognizes help and version", () => {
    expect(parseArgs(["--help"])).toEqual({ kind: "help" });
    expect(parseArgs(["-p", "80", "-v"])).toEqual({ kind: "version" });
  });
});

describe("buildConfig", () => {
  it("maps options onto the server config", () => {
    const config = buildConfig(
      serveOptions(["site", "-p", "0", "--join-headers", "-w", "16", "-q"]),
      "/home/user",
    );

    expect(config.root).toBe("/home/user/site");
    expect(config.port).toBe(0);
    expect(config.headerPolicy).toBe("join");
    expect(config.listenBacklog).toBe(16);
    expect(config.quiet).toBe(true);
    expect(config.idleTimeoutMs).toBe(5000);
    expect(config.serverName).toBe("plainserve");
  });

  it("keeps absolute roots as given", () => {
    const config = buildConfig(serveOptions(["/var/www"]), "/home/user");
    expect(config.root).toBe("/var/www");
    expect(config.headerPolicy).toBe("last-wins");
  });
});

describe("helpText", () => {
  it("lists every flag", () => {
    const text = helpText();
    for (const flag of [
      "--root",
      "--port",
      "--host",
      "--backlog",
      "--idle-timeout",
      "--request-timeout",
      "--max-header-size",
      "--join-headers",
      "--log-level",
      "--quiet",
      "--version",
      "--help",
    ]) {
      expect(text).toContain(flag);
    }
  });
});
