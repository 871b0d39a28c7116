#!/usr/bin/env node
import {
  basicLogger,
  createNodeServer,
  filteredLogger,
  prefixedLogger,
} from "@webserver/engine";
import { CliUsageError, HELP_TEXT, parseArgs } from "./args.js";
import { ConfigFileError, loadConfigFile, resolveSettings } from "./config-file.js";

const VERSION = "1.0.0";

async function main(): Promise<void> {
  const command = parseArgs(process.argv.slice(2));
  if (command.kind === "help") {
    console.log(HELP_TEXT);
    return;
  }
  if (command.kind === "version") {
    console.log(VERSION);
    return;
  }

  const args = command.options;
  const file =
    args.configPath === undefined ? null : await loadConfigFile(args.configPath);
  const { config, logLevel } = resolveSettings(args, file, process.cwd());
  const logger = filteredLogger(
    logLevel,
    prefixedLogger("webserver", basicLogger()),
  );
  if (file) {
    logger.debug(`Loaded configuration from ${file.path}`);
  }

  const server = createNodeServer({ config, logger });
  const port = await server.start();

  const url = `http://${config.host === "0.0.0.0" ? "localhost" : config.host}:${port}`;
  console.log(`\n  webserver serving ${config.root}\n`);
  console.log(`  Local:   ${url}`);
  console.log();

  const shutdown = () => {
    console.log("\nShutting down...");
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  if (err instanceof CliUsageError) {
    console.error(err.message);
    console.error(HELP_TEXT);
    process.exit(1);
  }
  if (err instanceof ConfigFileError) {
    console.error(err.message);
    process.exit(1);
  }
  console.error("Fatal error:", err);
  process.exit(1);
});
