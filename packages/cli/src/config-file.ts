import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  defaultConfig,
  isLogLevel,
  type LogLevel,
  type ServerConfig,
} from "@webserver/engine";
import { parse } from "smol-toml";
import type { CliOptions } from "./args.js";

export type ConfigFileErrorCode =
  | "NOT_FOUND"
  | "UNREADABLE"
  | "INVALID_TOML"
  | "INVALID_VALUE";

export class ConfigFileError extends Error {
  constructor(
    readonly code: ConfigFileErrorCode,
    message: string,
    readonly filePath: string,
  ) {
    super(message);
    this.name = "ConfigFileError";
  }
}

/**
 * Settings a config file may carry, e.g.
 *
 * ```toml
 * port = 8080
 * host = "0.0.0.0"
 * root = "public"
 * server_name = "webserver"
 * quiet = false
 * log_level = "info"
 * request_timeout_ms = 5000
 * max_header_size = 8192
 * ```
 *
 * A relative `root` is resolved against the file's directory.
 */
export interface FileSettings {
  port?: number;
  host?: string;
  root?: string;
  serverName?: string;
  quiet?: boolean;
  logLevel?: LogLevel;
  requestTimeoutMs?: number;
  maxHeaderSize?: number;
}

export interface LoadedConfigFile {
  /** Absolute path the settings were read from. */
  path: string;
  settings: FileSettings;
}

function invalidValue(
  filePath: string,
  key: string,
  expected: string,
): ConfigFileError {
  return new ConfigFileError(
    "INVALID_VALUE",
    `Invalid value for "${key}" in ${filePath}: expected ${expected}`,
    filePath,
  );
}

function readInteger(
  value: unknown,
  key: string,
  filePath: string,
  min: number,
  max: number,
): number {
  if (
    typeof value !== "number" ||
    !Number.isInteger(value) ||
    value < min ||
    value > max
  ) {
    throw invalidValue(filePath, key, `an integer from ${min} to ${max}`);
  }
  return value;
}

function readString(value: unknown, key: string, filePath: string): string {
  if (typeof value !== "string" || value === "") {
    throw invalidValue(filePath, key, "a non-empty string");
  }
  return value;
}

export function parseConfigToml(text: string, filePath: string): FileSettings {
  let table: Record<string, unknown>;
  try {
    table = parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigFileError(
      "INVALID_TOML",
      `Invalid TOML in ${filePath}: ${reason}`,
      filePath,
    );
  }

  const settings: FileSettings = {};
  for (const [key, value] of Object.entries(table)) {
    switch (key) {
      case "port":
        settings.port = readInteger(value, key, filePath, 0, 65535);
        break;
      case "host":
        settings.host = readString(value, key, filePath);
        break;
      case "root":
        settings.root = readString(value, key, filePath);
        break;
      case "server_name":
        settings.serverName = readString(value, key, filePath);
        break;
      case "quiet":
        if (typeof value !== "boolean") {
          throw invalidValue(filePath, key, "true or false");
        }
        settings.quiet = value;
        break;
      case "log_level": {
        const level = readString(value, key, filePath);
        if (!isLogLevel(level)) {
          throw invalidValue(filePath, key, "debug, info, warn or error");
        }
        settings.logLevel = level;
        break;
      }
      case "request_timeout_ms":
        settings.requestTimeoutMs = readInteger(
          value,
          key,
          filePath,
          1,
          Number.MAX_SAFE_INTEGER,
        );
        break;
      case "max_header_size":
        settings.maxHeaderSize = readInteger(
          value,
          key,
          filePath,
          1,
          Number.MAX_SAFE_INTEGER,
        );
        break;
      default:
        throw new ConfigFileError(
          "INVALID_VALUE",
          `Unknown key "${key}" in ${filePath}`,
          filePath,
        );
    }
  }
  return settings;
}

export async function loadConfigFile(filePath: string): Promise<LoadedConfigFile> {
  const resolved = path.resolve(filePath);

  let text: string;
  try {
    text = await fs.readFile(resolved, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new ConfigFileError(
        "NOT_FOUND",
        `Config file not found: ${resolved}`,
        resolved,
      );
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigFileError(
      "UNREADABLE",
      `Cannot read config file ${resolved}: ${reason}`,
      resolved,
    );
  }

  return { path: resolved, settings: parseConfigToml(text, resolved) };
}

export interface ResolvedSettings {
  config: ServerConfig;
  logLevel: LogLevel;
}

/** Merge command-line options over file settings over engine defaults. */
export function resolveSettings(
  options: CliOptions,
  file: LoadedConfigFile | null,
  cwd: string,
): ResolvedSettings {
  const fromFile = file?.settings ?? {};

  let root = path.resolve(cwd);
  if (options.root !== undefined) {
    root = path.resolve(cwd, options.root);
  } else if (file && fromFile.root !== undefined) {
    root = path.resolve(path.dirname(file.path), fromFile.root);
  }

  const base = defaultConfig(root);
  return {
    config: {
      ...base,
      port: options.port ?? fromFile.port ?? base.port,
      host: options.host ?? fromFile.host ?? base.host,
      serverName: fromFile.serverName ?? base.serverName,
      quiet: options.quiet || (fromFile.quiet ?? base.quiet),
      requestTimeoutMs: fromFile.requestTimeoutMs ?? base.requestTimeoutMs,
      maxHeaderSize: fromFile.maxHeaderSize ?? base.maxHeaderSize,
    },
    logLevel: options.logLevel ?? fromFile.logLevel ?? "info",
  };
}
