// stdout belongs to the status bar, so every diagnostic line goes to stderr.

export type LogLevel = "debug" | "info" | "warn" | "error";

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(line: string): void;
  info(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const debug = env.BLOCKBAR_DEBUG;
  if (debug === "1" || debug === "true" || debug === "yes") return "debug";

  const level = env.BLOCKBAR_LOG_LEVEL;
  if (level === "debug" || level === "info" || level === "warn" || level === "error") {
    return level;
  }
  return "info";
}

export function createLogger(
  scope: string,
  level: LogLevel = levelFromEnv(),
  write: (line: string) => void = (line) => console.error(line)
): Logger {
  const threshold = levelRank[level];
  const emit = (at: LogLevel, line: string): void => {
    if (levelRank[at] < threshold) return;
    write(`[${scope}] ${at === "info" ? "" : `${at}: `}${line}`);
  };

  return {
    debug: (line) => emit("debug", line),
    info: (line) => emit("info", line),
    warn: (line) => emit("warn", line),
    error: (line) => emit("error", line),
  };
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
