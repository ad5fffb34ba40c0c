#!/usr/bin/env node

import { startServer } from "./index.js";
import { DEFAULT_PORT, TICK_INTERVAL_MS } from "@blockbar/shared";
import { DEFAULT_DISPLAY_CONFIG, dumpConfig, loadConfig, type DisplayConfig } from "./config.js";
import { describeError } from "./log.js";

const args = process.argv.slice(2);

function printHelp(): void {
  // stdout is reserved for the status line once the daemon runs
  console.error(`
blockbar - Pomodoro block timer for xmobar, controlled over HTTP/WebSocket

Usage:
  blockbar [options]

Options:
  --port <n>            Control server port (default: ${DEFAULT_PORT})
  --config <file>       Load display colors and thresholds from a JSON file
  --dump-config <file>  Write the effective display configuration to a file and exit
  --interval <ms>       Tick interval (default: ${TICK_INTERVAL_MS})
  --help                Show this help message

Environment:
  BLOCKBAR_LOG_LEVEL    debug | info | warn | error (default: info)
  BLOCKBAR_DEBUG=1      Same as BLOCKBAR_LOG_LEVEL=debug

Examples:
  blockbar
  blockbar --port 9000 --config ~/.config/blockbar.json
  blockbar --dump-config ~/.config/blockbar.json
`);
}

function optionValue(name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) return undefined;
  const value = args[index + 1];
  if (value === undefined || value.startsWith("--")) {
    console.error(`Missing value for ${name}`);
    process.exit(1);
  }
  return value;
}

function parseIntegerOption(name: string, min: number, max: number): number | undefined {
  const raw = optionValue(name);
  if (raw === undefined) return undefined;
  const parsed = parseInt(raw, 10);
  if (isNaN(parsed) || parsed < min || parsed > max) {
    console.error(`Invalid value for ${name}: ${raw}`);
    process.exit(1);
  }
  return parsed;
}

async function main(): Promise<void> {
  if (args.includes("--help") || args.includes("-h")) {
    printHelp();
    process.exit(0);
  }

  const port = parseIntegerOption("--port", 1, 65535) ?? DEFAULT_PORT;
  const intervalMs = parseIntegerOption("--interval", 50, 60_000) ?? TICK_INTERVAL_MS;

  let config: DisplayConfig = DEFAULT_DISPLAY_CONFIG;
  const configPath = optionValue("--config");
  if (configPath !== undefined) {
    config = await loadConfig(configPath);
  }

  const dumpPath = optionValue("--dump-config");
  if (dumpPath !== undefined) {
    await dumpConfig(dumpPath, config);
    console.error(`Wrote configuration to ${dumpPath}`);
    process.exit(0);
  }

  startServer({ port, config, intervalMs });
}

main().catch((e: unknown) => {
  console.error(describeError(e));
  process.exit(1);
});
