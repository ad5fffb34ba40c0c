import { TICK_INTERVAL_MS } from "@blockbar/shared";
import type { ActivityLog } from "./activity-log.js";
import { createLogger, describeError, type Logger } from "./log.js";
import type { StatusLine } from "./status-line.js";
import type { Clock, TimerStateMachine } from "./timer.js";
import type { Sampler } from "./window-sampler.js";

export interface TickLoopOptions {
  machine: TimerStateMachine;
  activityLog: ActivityLog;
  sampler: Sampler;
  statusLine: StatusLine;
  write: (line: string) => void;
  clock?: Clock;
  intervalMs?: number;
  logger?: Logger;
}

export class TickLoop {
  private readonly machine: TimerStateMachine;
  private readonly activityLog: ActivityLog;
  private readonly sampler: Sampler;
  private readonly statusLine: StatusLine;
  private readonly write: (line: string) => void;
  private readonly clock: Clock;
  private readonly intervalMs: number;
  private readonly log: Logger;
  private interval: NodeJS.Timeout | null = null;
  private sampleInFlight = false;

  constructor(options: TickLoopOptions) {
    this.machine = options.machine;
    this.activityLog = options.activityLog;
    this.sampler = options.sampler;
    this.statusLine = options.statusLine;
    this.write = options.write;
    this.clock = options.clock ?? Date.now;
    this.intervalMs = options.intervalMs ?? TICK_INTERVAL_MS;
    this.log = options.logger ?? createLogger("tick");
  }

  start(): void {
    if (this.interval) return;
    void this.tick();
    this.interval = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
  }

  stop(): void {
    if (this.interval) clearInterval(this.interval);
    this.interval = null;
  }

  /**
   * Runs one tick. The status line is written before this returns; the
   * returned promise settles once the sample started by this tick (if any) has
   * been recorded.
   */
  tick(): Promise<void> {
    try {
      const transition = this.machine.advance();
      if (transition) this.log.info(`${transition.from} -> ${transition.to}`);
    } catch (e) {
      this.log.error(`transition failed: ${describeError(e)}`);
    }

    let pending: Promise<void> = Promise.resolve();
    if (this.machine.state === "running" && !this.sampleInFlight) {
      pending = this.sampleFocusedWindow();
    }

    try {
      this.write(this.statusLine.render(this.machine.statusSnapshot()));
    } catch (e) {
      this.log.error(`render failed: ${describeError(e)}`);
    }

    return pending;
  }

  private async sampleFocusedWindow(): Promise<void> {
    this.sampleInFlight = true;
    const transitionsAtQuery = this.machine.transitionCount;
    try {
      const title = await this.sampler.currentFocusedWindowTitle();
      if (title === null) {
        this.log.debug("no focused window title; sample dropped");
        return;
      }
      // A pause and resume while the query ran leaves the state "running",
      // but the title no longer covers the interval being credited.
      if (this.machine.transitionCount !== transitionsAtQuery) {
        this.log.debug("block changed state during the query; sample dropped");
        return;
      }
      this.activityLog.sample(title, this.clock(), this.machine.state);
    } catch (e) {
      this.log.debug(`sample dropped: ${describeError(e)}`);
    } finally {
      this.sampleInFlight = false;
    }
  }
}
