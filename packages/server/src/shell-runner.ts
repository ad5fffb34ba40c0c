import { spawn } from "child_process";
import type { ShellRunner } from "./timer.js";
import { createLogger, describeError, type Logger } from "./log.js";

/** Runs commands through `sh -c`, detached, without waiting for them. */
export class DetachedShellRunner implements ShellRunner {
  private readonly log: Logger;

  constructor(logger: Logger = createLogger("shell")) {
    this.log = logger;
  }

  run(command: string): void {
    this.log.info(`running ${JSON.stringify(command)}`);
    try {
      const child = spawn("sh", ["-c", command], { detached: true, stdio: "ignore" });
      child.on("error", (e) => {
        this.log.warn(`command failed to start: ${describeError(e)}`);
      });
      child.unref();
    } catch (e) {
      this.log.warn(`command failed to start: ${describeError(e)}`);
    }
  }
}
