import { execFile } from "child_process";
import { createLogger, type Logger } from "./log.js";

export interface Sampler {
  // Resolves to null when no title could be read; never rejects.
  currentFocusedWindowTitle(): Promise<string | null>;
}

export interface XdotoolSamplerOptions {
  command?: string;
  timeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_COMMAND = "xdotool";
const DEFAULT_TIMEOUT_MS = 500;

/** Reads the focused X11 window's title through `xdotool`. */
export class XdotoolSampler implements Sampler {
  private readonly command: string;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(options: XdotoolSamplerOptions = {}) {
    this.command = options.command ?? DEFAULT_COMMAND;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = options.logger ?? createLogger("sampler");
  }

  currentFocusedWindowTitle(): Promise<string | null> {
    return new Promise((resolve) => {
      execFile(
        this.command,
        ["getactivewindow", "getwindowname"],
        { timeout: this.timeoutMs, encoding: "utf8" },
        (err, stdout) => {
          if (err) {
            this.log.debug(`window query failed: ${err.message}`);
            resolve(null);
            return;
          }
          const title = stdout.trim();
          resolve(title.length > 0 ? title : null);
        }
      );
    });
  }
}
