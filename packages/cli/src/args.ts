import { isLogLevel, type LogLevel } from "@webserver/engine";

/**
 * Values given on the command line. Unset fields fall back to the config
 * file, then to the engine defaults.
 */
export interface CliOptions {
  root?: string;
  port?: number;
  host?: string;
  quiet: boolean;
  logLevel?: LogLevel;
  /** Path of a TOML config file (`--config`). */
  configPath?: string;
}

export type CliCommand =
  | { kind: "run"; options: CliOptions }
  | { kind: "help" }
  | { kind: "version" };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function requireValue(args: string[], i: number, flag: string): string {
  const value = args[i];
  if (value === undefined) {
    throw new CliUsageError(`Missing value for ${flag}`);
  }
  return value;
}

export function parseArgs(args: string[]): CliCommand {
  const options: CliOptions = { quiet: false };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--port" || arg === "-p") {
      const raw = requireValue(args, ++i, arg);
      const port = Number(raw);
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new CliUsageError(`Invalid port number: ${raw}`);
      }
      options.port = port;
    } else if (arg === "--host" || arg === "-H") {
      options.host = requireValue(args, ++i, arg);
    } else if (arg === "--config" || arg === "-c") {
      options.configPath = requireValue(args, ++i, arg);
    } else if (arg === "--quiet" || arg === "-q") {
      options.quiet = true;
    } else if (arg === "--log-level") {
      const level = requireValue(args, ++i, arg);
      if (!isLogLevel(level)) {
        throw new CliUsageError(`Unknown log level: ${level}`);
      }
      options.logLevel = level;
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else if (!arg.startsWith("-")) {
      options.root = arg;
    } else {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
    i++;
  }

  return { kind: "run", options };
}

export const HELP_TEXT = `
webserver - serve static files over HTTP/1.1

Usage: webserver [directory] [options]

Options:
  --config, -c <file>   Read settings from a TOML file; flags take precedence
  --port, -p <port>     Port to listen on (default: 8080)
  --host, -H <host>     Host to bind (default: 127.0.0.1)
  --quiet, -q           Suppress request logging
  --log-level <level>   debug, info, warn or error (default: info)
  --version, -v         Show version
  --help, -h            Show this help
`;
