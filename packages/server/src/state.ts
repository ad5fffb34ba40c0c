import type { ServerMessage, StatusSnapshot } from "@blockbar/shared";
import { TICK_INTERVAL_MS } from "@blockbar/shared";
import { ActivityLog } from "./activity-log.js";
import { DEFAULT_DISPLAY_CONFIG, type DisplayConfig } from "./config.js";
import { CommandDispatcher } from "./dispatcher.js";
import { createLogger, type Logger } from "./log.js";
import { StatusLine } from "./status-line.js";
import { TimerStateMachine, type Clock, type ShellRunner } from "./timer.js";

type StateChangeCallback = (message: ServerMessage) => void;

export interface DaemonStateOptions {
  config?: DisplayConfig;
  clock?: Clock;
  shell?: ShellRunner;
  sampleIntervalMs?: number;
  logger?: Logger;
}

/**
 * The one timer and activity log of the process, shared by reference between
 * the tick loop and the control surface. Node's event loop runs each command
 * and each tick to completion, which serializes all access to it.
 */
export class DaemonState {
  readonly machine: TimerStateMachine;
  readonly activityLog: ActivityLog;
  readonly statusLine: StatusLine;
  readonly dispatcher: CommandDispatcher;
  private listeners: Set<StateChangeCallback> = new Set();
  private unsubscribeMachine: (() => void) | null = null;

  constructor(options: DaemonStateOptions = {}) {
    const config = options.config ?? DEFAULT_DISPLAY_CONFIG;
    this.machine = new TimerStateMachine({
      clock: options.clock,
      shell: options.shell,
      blockEndCommand: config.blockEndCommand,
    });
    this.activityLog = new ActivityLog({
      clock: options.clock,
      sampleIntervalMs: options.sampleIntervalMs ?? TICK_INTERVAL_MS,
    });
    this.statusLine = new StatusLine(config);
    this.dispatcher = new CommandDispatcher(
      this.machine,
      this.activityLog,
      this.statusLine,
      options.logger ?? createLogger("command")
    );

    this.unsubscribeMachine = this.machine.subscribe((transition) => {
      this.activityLog.recordTransition(transition);
      this.broadcast();
    });
  }

  subscribe(callback: StateChangeCallback): () => void {
    this.listeners.add(callback);
    callback(this.statusMessage());
    return () => this.listeners.delete(callback);
  }

  getStatus(): StatusSnapshot {
    return this.machine.statusSnapshot();
  }

  private statusMessage(): ServerMessage {
    return { type: "status", status: this.getStatus() };
  }

  private broadcast(): void {
    const message = this.statusMessage();
    for (const listener of this.listeners) {
      listener(message);
    }
  }

  destroy(): void {
    this.unsubscribeMachine?.();
    this.unsubscribeMachine = null;
    this.listeners.clear();
  }
}
