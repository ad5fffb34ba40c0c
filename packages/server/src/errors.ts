import type { BlockState, RejectionReason } from "@blockbar/shared";

export type RejectionSeverity = "warning" | "error";

/**
 * A command that is not valid in the current state. Returned to the caller and
 * flashed on the status line; never thrown.
 */
export interface RejectedTransition {
  reason: RejectionReason;
  severity: RejectionSeverity;
  state: BlockState;
  message: string;
}

const messages: Record<RejectionReason, string> = {
  "already-active": "a block is already in progress; cancel it first",
  "in-cooldown": "cooldown is in progress and cannot be interrupted",
  "not-active": "no block is in progress",
  "not-paused": "the block is not paused",
  "invalid-duration": "duration must be a positive whole number of seconds",
};

export function rejection(reason: RejectionReason, state: BlockState): RejectedTransition {
  return {
    reason,
    severity: reason === "in-cooldown" ? "error" : "warning",
    state,
    message: messages[reason],
  };
}

export interface ConfigIssue {
  field: string;
  message: string;
}

export class ConfigError extends Error {
  readonly issues: ConfigIssue[];

  constructor(source: string, issues: ConfigIssue[]) {
    super(
      `invalid configuration in ${source}: ` +
        issues.map((issue) => `${issue.field}: ${issue.message}`).join("; ")
    );
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class ConfigWriteError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`could not write configuration to ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = "ConfigWriteError";
    this.path = path;
  }
}
