import type { Command, CommandResult, LogScope } from "@blockbar/shared";
import { formatDump, type ActivityLog } from "./activity-log.js";
import { createLogger, type Logger } from "./log.js";
import type { StatusLine } from "./status-line.js";
import type { TimerStateMachine, TransitionResult } from "./timer.js";

/**
 * Applies control commands to the timer and the activity log. Every call runs
 * to completion synchronously, so commands never interleave with a tick.
 */
export class CommandDispatcher {
  private readonly log: Logger;

  constructor(
    private readonly machine: TimerStateMachine,
    private readonly activityLog: ActivityLog,
    private readonly statusLine: StatusLine,
    logger?: Logger
  ) {
    this.log = logger ?? createLogger("command");
  }

  startBlock(durationSeconds: number): CommandResult {
    return this.settle("startBlock", this.machine.start(durationSeconds));
  }

  pauseBlock(): CommandResult {
    return this.settle("pauseBlock", this.machine.pause());
  }

  resumeBlock(): CommandResult {
    return this.settle("resumeBlock", this.machine.resume());
  }

  cancelBlock(): CommandResult {
    return this.settle("cancelBlock", this.machine.cancel());
  }

  taskLogAdd(label: string): CommandResult {
    this.activityLog.enable(label);
    this.log.info(`task log enabled as ${JSON.stringify(label)}`);
    return { ok: true, state: this.machine.state };
  }

  taskLogRemove(): CommandResult {
    this.activityLog.disable();
    this.log.info("task log disabled");
    return { ok: true, state: this.machine.state };
  }

  taskLogOutput(reset: boolean, scope: LogScope = "long"): CommandResult {
    return {
      ok: true,
      state: this.machine.state,
      output: formatDump(this.activityLog.dump(reset, scope)),
    };
  }

  dispatch(command: Command): CommandResult {
    switch (command.name) {
      case "startBlock":
        return this.startBlock(command.duration);
      case "pauseBlock":
        return this.pauseBlock();
      case "resumeBlock":
        return this.resumeBlock();
      case "cancelBlock":
        return this.cancelBlock();
      case "taskLogAdd":
        return this.taskLogAdd(command.label);
      case "taskLogRemove":
        return this.taskLogRemove();
      case "taskLogOutput":
        return this.taskLogOutput(command.reset, command.scope);
    }
  }

  private settle(name: Command["name"], result: TransitionResult): CommandResult {
    if (result.ok) {
      return { ok: true, state: result.state };
    }

    const { error } = result;
    this.statusLine.flash(error.severity);
    this.log.warn(`${name} rejected in ${error.state}: ${error.message}`);
    return { ok: false, state: error.state, reason: error.reason, message: error.message };
  }
}
