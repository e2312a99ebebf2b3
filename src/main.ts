#!/usr/bin/env node
/**
 * CLI entrypoint: prints user agents from the configured catalogs
 *
 * Usage:
 *   npm run build && node dist/main.js [desktop|mobile|random] [--count N] [--list]
 *
 * Examples:
 *   node dist/main.js                  # one random user agent from either catalog
 *   node dist/main.js mobile --count 5 # five mobile user agents
 *   node dist/main.js desktop --list   # the whole desktop catalog as JSON
 *
 * Environment variables (optional, also read from .env):
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 *   - MAX_REQUESTS_PER_MINUTE / RATE_LIMIT_WINDOW_MS: cap on printed user agents
 *   - DESKTOP_CATALOG_PATH / MOBILE_CATALOG_PATH: catalog JSON files
 */

import "dotenv/config";
import { loadAppConfig } from "@/config";
import { UserAgentManager } from "@/catalog";
import * as logger from "@/logger";
import { parseArgs, type CliArgs } from "@/cli/args";
import { runCli } from "@/cli/run";

async function main(): Promise<void> {
  const config = loadAppConfig();
  logger.setLogLevel(config.logLevel);

  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(2);
  }

  let manager: UserAgentManager;
  try {
    manager = UserAgentManager.load(
      { type: "file", path: config.catalogs.desktopPath },
      { type: "file", path: config.catalogs.mobilePath },
    );
  } catch (err) {
    logger.error("Failed to load user-agent catalogs", {
      error: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  }

  try {
    process.exitCode = await runCli(args, config, manager);
  } catch (err) {
    logger.error("CLI failed with fatal error", {
      error: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  }
}

main();
