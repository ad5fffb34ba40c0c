import type { BlockState, StatusSnapshot } from "@blockbar/shared";
import { COOLDOWN_SECONDS } from "@blockbar/shared";
import { rejection, type RejectedTransition } from "./errors.js";

export type Clock = () => number;

export interface ShellRunner {
  // Fire-and-forget; must not throw.
  run(command: string): void;
}

export type TransitionEvent =
  | "start"
  | "pause"
  | "resume"
  | "cancel"
  | "block-end"
  | "cooldown-end";

export interface Transition {
  event: TransitionEvent;
  from: BlockState;
  to: BlockState;
  at: number;
}

export type TransitionResult =
  | { ok: true; state: BlockState }
  | { ok: false; error: RejectedTransition };

type TransitionCallback = (transition: Transition) => void;

export interface TimerOptions {
  clock?: Clock;
  shell?: ShellRunner;
  // Run once every time a block finishes and cooldown begins
  blockEndCommand?: string | null;
  cooldownSeconds?: number;
}

type Phase =
  | { state: "idle" }
  | { state: "running"; startedAt: number; pausedTotalMs: number }
  | { state: "paused"; startedAt: number; pausedTotalMs: number; pausedAt: number }
  | { state: "cooldown"; startedAt: number };

// Largest duration whose millisecond value is still an exact integer
export const MAX_DURATION_SECONDS = Math.floor(Number.MAX_SAFE_INTEGER / 1000);

export class TimerStateMachine {
  private phase: Phase = { state: "idle" };
  private blockDurationMs: number | null = null;
  private readonly cooldownMs: number;
  private readonly clock: Clock;
  private readonly shell: ShellRunner | null;
  private readonly blockEndCommand: string | null;
  private listeners: Set<TransitionCallback> = new Set();
  private transitions = 0;

  constructor(options: TimerOptions = {}) {
    this.clock = options.clock ?? Date.now;
    this.shell = options.shell ?? null;
    this.blockEndCommand = options.blockEndCommand ?? null;
    this.cooldownMs = (options.cooldownSeconds ?? COOLDOWN_SECONDS) * 1000;
  }

  get state(): BlockState {
    return this.phase.state;
  }

  /** Number of transitions so far; changes whenever the state does. */
  get transitionCount(): number {
    return this.transitions;
  }

  subscribe(callback: TransitionCallback): () => void {
    this.listeners.add(callback);
    return () => this.listeners.delete(callback);
  }

  start(durationSeconds: number): TransitionResult {
    const phase = this.phase;
    if (phase.state === "cooldown") return this.reject("in-cooldown");
    if (phase.state !== "idle") return this.reject("already-active");
    if (
      !Number.isSafeInteger(durationSeconds) ||
      durationSeconds <= 0 ||
      durationSeconds > MAX_DURATION_SECONDS
    ) {
      return this.reject("invalid-duration");
    }

    const now = this.clock();
    this.blockDurationMs = durationSeconds * 1000;
    this.phase = { state: "running", startedAt: now, pausedTotalMs: 0 };
    return this.accept("start", phase.state, now);
  }

  /** Pauses a running block, or resumes a paused one. */
  pause(): TransitionResult {
    const phase = this.phase;
    switch (phase.state) {
      case "running": {
        const now = this.clock();
        this.phase = { ...phase, state: "paused", pausedAt: now };
        return this.accept("pause", "running", now);
      }
      case "paused":
        return this.resume();
      case "cooldown":
        return this.reject("in-cooldown");
      case "idle":
        return this.reject("not-active");
    }
  }

  resume(): TransitionResult {
    const phase = this.phase;
    switch (phase.state) {
      case "paused": {
        const now = this.clock();
        this.phase = {
          state: "running",
          startedAt: phase.startedAt,
          pausedTotalMs: phase.pausedTotalMs + Math.max(0, now - phase.pausedAt),
        };
        return this.accept("resume", "paused", now);
      }
      case "running":
        return this.reject("not-paused");
      case "cooldown":
        return this.reject("in-cooldown");
      case "idle":
        return this.reject("not-active");
    }
  }

  cancel(): TransitionResult {
    const phase = this.phase;
    if (phase.state === "cooldown") return this.reject("in-cooldown");
    if (phase.state === "idle") return this.reject("not-active");

    this.phase = { state: "idle" };
    this.blockDurationMs = null;
    return this.accept("cancel", phase.state, this.clock());
  }

  /**
   * Applies the transition that is due at the current time, if any: a finished
   * block enters cooldown, a finished cooldown returns to idle.
   */
  advance(): Transition | null {
    const phase = this.phase;
    const now = this.clock();

    if (phase.state === "running" && this.remainingAt(now) <= 0) {
      this.phase = { state: "cooldown", startedAt: now };
      const transition = this.emit("block-end", "running", now);
      if (this.shell && this.blockEndCommand) {
        this.shell.run(this.blockEndCommand);
      }
      return transition;
    }

    if (phase.state === "cooldown" && this.remainingAt(now) <= 0) {
      this.phase = { state: "idle" };
      return this.emit("cooldown-end", "cooldown", now);
    }

    return null;
  }

  statusSnapshot(): StatusSnapshot {
    const now = this.clock();
    const state = this.phase.state;
    const remainingMs = this.remainingAt(now);
    const totalMs = state === "cooldown" ? this.cooldownMs : this.blockDurationMs ?? 0;

    return {
      state,
      remainingMs,
      remainingSeconds: Math.floor(remainingMs / 1000),
      blockDurationSeconds: this.blockDurationMs === null ? null : this.blockDurationMs / 1000,
      elapsedFraction:
        state === "idle" || totalMs <= 0 ? 0 : Math.min(1, (totalMs - remainingMs) / totalMs),
    };
  }

  private remainingAt(now: number): number {
    const phase = this.phase;
    switch (phase.state) {
      case "idle":
        return 0;
      case "running":
        return this.remainingOfBlock(now - phase.startedAt - phase.pausedTotalMs);
      case "paused":
        return this.remainingOfBlock(phase.pausedAt - phase.startedAt - phase.pausedTotalMs);
      case "cooldown":
        return Math.max(0, this.cooldownMs - (now - phase.startedAt));
    }
  }

  private remainingOfBlock(activeMs: number): number {
    return Math.max(0, (this.blockDurationMs ?? 0) - Math.max(0, activeMs));
  }

  private accept(event: TransitionEvent, from: BlockState, at: number): TransitionResult {
    this.emit(event, from, at);
    return { ok: true, state: this.phase.state };
  }

  private reject(reason: RejectedTransition["reason"]): TransitionResult {
    return { ok: false, error: rejection(reason, this.phase.state) };
  }

  private emit(event: TransitionEvent, from: BlockState, at: number): Transition {
    const transition: Transition = { event, from, to: this.phase.state, at };
    this.transitions += 1;
    for (const listener of this.listeners) {
      listener(transition);
    }
    return transition;
  }
}
