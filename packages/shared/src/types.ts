export type BlockState = "idle" | "running" | "paused" | "cooldown";

// "block" covers the current block only; "long" runs until reset by hand
export type LogScope = "block" | "long";

export interface StatusSnapshot {
  state: BlockState;
  remainingMs: number;
  remainingSeconds: number;
  blockDurationSeconds: number | null;
  // 0 at the start of a block or cooldown, 1 at its end
  elapsedFraction: number;
}

export type CommandName =
  | "startBlock"
  | "pauseBlock"
  | "resumeBlock"
  | "cancelBlock"
  | "taskLogAdd"
  | "taskLogRemove"
  | "taskLogOutput";

export type Command =
  | { name: "startBlock"; duration: number }
  | { name: "pauseBlock" }
  | { name: "resumeBlock" }
  | { name: "cancelBlock" }
  | { name: "taskLogAdd"; label: string }
  | { name: "taskLogRemove" }
  | { name: "taskLogOutput"; reset: boolean; scope?: LogScope };

export type RejectionReason =
  | "already-active"
  | "in-cooldown"
  | "not-active"
  | "not-paused"
  | "invalid-duration";

export type CommandResult =
  | { ok: true; state: BlockState; output?: string }
  | { ok: false; state: BlockState; reason: RejectionReason; message: string };

// WebSocket messages from server to client
export type ServerMessage =
  | { type: "status"; status: StatusSnapshot }
  | { type: "result"; id?: string; result: CommandResult }
  | { type: "error"; id?: string; message: string }
  | { type: "pong" };

// WebSocket messages from client to server
export type ClientMessage =
  | { type: "ping" }
  | { type: "command"; id?: string; command: Command };

// Server configuration
export const DEFAULT_PORT = 8765;
export const COOLDOWN_SECONDS = 300;
export const TICK_INTERVAL_MS = 1000;
