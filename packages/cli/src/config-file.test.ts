import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { defaultConfig } from "@webserver/engine";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import {
  ConfigFileError,
  loadConfigFile,
  parseConfigToml,
  resolveSettings,
} from "./config-file.js";

const FILE = "/etc/webserver.toml";

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}

describe("parseConfigToml", () => {
  it("reads every supported key", () => {
    const text = [
      "port = 9090",
      'host = "0.0.0.0"',
      'root = "public"',
      'server_name = "edge"',
      "quiet = true",
      'log_level = "warn"',
      "request_timeout_ms = 2500",
      "max_header_size = 4096",
    ].join("\n");

    expect(parseConfigToml(text, FILE)).toEqual({
      port: 9090,
      host: "0.0.0.0",
      root: "public",
      serverName: "edge",
      quiet: true,
      logLevel: "warn",
      requestTimeoutMs: 2500,
      maxHeaderSize: 4096,
    });
  });

  it("returns no settings for an empty file", () => {
    expect(parseConfigToml("", FILE)).toEqual({});
  });

  it("rejects values of the wrong type or range", () => {
    const quoted = thrownBy(() => parseConfigToml('port = "8080"', FILE));
    expect(quoted).toBeInstanceOf(ConfigFileError);
    expect(quoted).toMatchObject({
      code: "INVALID_VALUE",
      filePath: FILE,
      message:
        'Invalid value for "port" in /etc/webserver.toml: expected an integer from 0 to 65535',
    });

    expect(thrownBy(() => parseConfigToml("port = 70000", FILE))).toMatchObject({
      code: "INVALID_VALUE",
    });
    expect(
      thrownBy(() => parseConfigToml('log_level = "trace"', FILE)),
    ).toMatchObject({ code: "INVALID_VALUE" });
    expect(thrownBy(() => parseConfigToml('quiet = "yes"', FILE))).toMatchObject({
      code: "INVALID_VALUE",
    });
  });

  it("rejects unknown keys and tables", () => {
    expect(thrownBy(() => parseConfigToml("cors = true", FILE))).toMatchObject({
      code: "INVALID_VALUE",
      message: 'Unknown key "cors" in /etc/webserver.toml',
    });
    expect(
      thrownBy(() => parseConfigToml("[server]\nport = 1", FILE)),
    ).toMatchObject({ message: 'Unknown key "server" in /etc/webserver.toml' });
  });

  it("reports malformed TOML", () => {
    const err = thrownBy(() => parseConfigToml("port =\n", FILE));
    expect(err).toBeInstanceOf(ConfigFileError);
    expect(err).toMatchObject({ code: "INVALID_TOML", filePath: FILE });
  });
});

describe("loadConfigFile", () => {
  let dir = "";

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "webserver-config-"));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("loads settings and the absolute file path", async () => {
    const file = path.join(dir, "site.toml");
    await fs.writeFile(file, 'root = "site"\nport = 0\n');

    await expect(loadConfigFile(file)).resolves.toEqual({
      path: file,
      settings: { root: "site", port: 0 },
    });
  });

  it("rejects a missing file", async () => {
    const file = path.join(dir, "missing.toml");

    await expect(loadConfigFile(file)).rejects.toMatchObject({
      code: "NOT_FOUND",
      message: `Config file not found: ${file}`,
    });
  });

  it("rejects a malformed file", async () => {
    const file = path.join(dir, "broken.toml");
    await fs.writeFile(file, 'host = "unterminated\n');

    await expect(loadConfigFile(file)).rejects.toMatchObject({
      code: "INVALID_TOML",
      filePath: file,
    });
  });
});

describe("resolveSettings", () => {
  it("falls back to engine defaults rooted at the working directory", () => {
    expect(resolveSettings({ quiet: false }, null, "/srv")).toEqual({
      config: defaultConfig("/srv"),
      logLevel: "info",
    });
  });

  it("applies file settings with the root relative to the file", () => {
    const file = {
      path: "/etc/webserver/site.toml",
      settings: {
        root: "public",
        port: 9090,
        host: "0.0.0.0",
        serverName: "edge",
        quiet: true,
        logLevel: "warn" as const,
        maxHeaderSize: 4096,
      },
    };

    expect(resolveSettings({ quiet: false }, file, "/home/user")).toEqual({
      config: {
        port: 9090,
        host: "0.0.0.0",
        root: "/etc/webserver/public",
        serverName: "edge",
        quiet: true,
        requestTimeoutMs: 5000,
        maxHeaderSize: 4096,
      },
      logLevel: "warn",
    });
  });

  it("lets command-line options override the file", () => {
    const file = {
      path: "/etc/webserver/site.toml",
      settings: { root: "public", port: 9090, host: "0.0.0.0" },
    };

    const { config, logLevel } = resolveSettings(
      { quiet: false, root: "docs", port: 8000, host: "localhost", logLevel: "debug" },
      file,
      "/home/user",
    );

    expect(config.root).toBe("/home/user/docs");
    expect(config.port).toBe(8000);
    expect(config.host).toBe("localhost");
    expect(logLevel).toBe("debug");
  });
});
