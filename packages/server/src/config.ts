import { readFile, writeFile } from "fs/promises";
import { isHexColor } from "./color.js";
import { ConfigError, ConfigWriteError, type ConfigIssue } from "./errors.js";

export interface DisplayConfig {
  idleColor: string;
  blockStartColor: string;
  blockEndColor: string;
  cooldownStartColor: string;
  cooldownEndColor: string;
  warningColor: string;
  errorColor: string;
  cooldownMarker: string;
  // Renders a rejected command keeps flashing for
  warningFlashTicks: number;
  errorFlashTicks: number;
  // Below this many seconds the background blinks
  finalCountdownSeconds: number;
  blockEndCommand: string | null;
}

export const DEFAULT_DISPLAY_CONFIG: DisplayConfig = {
  idleColor: "#AAAAAA",
  blockStartColor: "#00FF00",
  blockEndColor: "#FFFF00",
  cooldownStartColor: "#FF0000",
  cooldownEndColor: "#00FFFF",
  warningColor: "#FFFF00",
  errorColor: "#FF0000",
  cooldownMarker: "~",
  warningFlashTicks: 5,
  errorFlashTicks: 7,
  finalCountdownSeconds: 10,
  blockEndCommand: null,
};

const COLOR_FIELDS = [
  "idleColor",
  "blockStartColor",
  "blockEndColor",
  "cooldownStartColor",
  "cooldownEndColor",
  "warningColor",
  "errorColor",
] as const;

const COUNT_FIELDS = ["warningFlashTicks", "errorFlashTicks", "finalCountdownSeconds"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export interface ValidationResult {
  issues: ConfigIssue[];
  config: DisplayConfig;
}

/** Merges a parsed JSON value over the defaults and reports every bad field. */
export function validateConfig(input: unknown): ValidationResult {
  const issues: ConfigIssue[] = [];
  const config: DisplayConfig = { ...DEFAULT_DISPLAY_CONFIG };

  if (!isRecord(input)) {
    return { issues: [{ field: "(root)", message: "Expected a JSON object" }], config };
  }

  const known = new Set<string>([...COLOR_FIELDS, ...COUNT_FIELDS, "cooldownMarker", "blockEndCommand"]);
  for (const key of Object.keys(input)) {
    if (!known.has(key)) issues.push({ field: key, message: "Unknown field" });
  }

  for (const field of COLOR_FIELDS) {
    const value = input[field];
    if (value === undefined) continue;
    if (typeof value === "string" && isHexColor(value)) {
      config[field] = value;
    } else {
      issues.push({ field, message: "Expected a color such as #A0C or #AA00CC" });
    }
  }

  for (const field of COUNT_FIELDS) {
    const value = input[field];
    if (value === undefined) continue;
    if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) {
      config[field] = value;
    } else {
      issues.push({ field, message: "Value must be a whole number >= 0" });
    }
  }

  const marker = input.cooldownMarker;
  if (marker !== undefined) {
    if (typeof marker === "string") config.cooldownMarker = marker;
    else issues.push({ field: "cooldownMarker", message: "Expected a string" });
  }

  const command = input.blockEndCommand;
  if (command !== undefined) {
    if (command === null || (typeof command === "string" && command.trim().length > 0)) {
      config.blockEndCommand = command;
    } else {
      issues.push({ field: "blockEndCommand", message: "Expected a non-empty string or null" });
    }
  }

  return { issues, config };
}

export async function loadConfig(path: string): Promise<DisplayConfig> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf8"));
  } catch (e) {
    throw new ConfigError(path, [{ field: "(file)", message: e instanceof Error ? e.message : String(e) }]);
  }

  const { issues, config } = validateConfig(parsed);
  if (issues.length > 0) throw new ConfigError(path, issues);
  return config;
}

export function serializeConfig(config: DisplayConfig): string {
  return JSON.stringify(config, null, 2) + "\n";
}

export async function dumpConfig(path: string, config: DisplayConfig): Promise<void> {
  try {
    await writeFile(path, serializeConfig(config), "utf8");
  } catch (e) {
    throw new ConfigWriteError(path, e);
  }
}
