import type { ClientMessage, Command, CommandName, LogScope } from "@blockbar/shared";

export type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

const COMMAND_NAMES: readonly CommandName[] = [
  "startBlock",
  "pauseBlock",
  "resumeBlock",
  "cancelBlock",
  "taskLogAdd",
  "taskLogRemove",
  "taskLogOutput",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const LOG_SCOPES: readonly LogScope[] = ["block", "long"];

function toLogScope(value: unknown): LogScope | undefined {
  return LOG_SCOPES.find((scope) => scope === value);
}

function toCommandName(value: unknown): CommandName | undefined {
  return COMMAND_NAMES.find((name) => name === value);
}

export function parseCommand(value: unknown): Parsed<Command> {
  if (!isRecord(value)) return { ok: false, error: "command must be an object" };

  const name = toCommandName(value.name);
  if (name === undefined) {
    return { ok: false, error: `unknown command ${JSON.stringify(value.name)}` };
  }

  switch (name) {
    case "startBlock": {
      const duration = value.duration;
      if (typeof duration !== "number") {
        return { ok: false, error: "startBlock needs a numeric duration" };
      }
      return { ok: true, value: { name, duration } };
    }
    case "taskLogAdd": {
      const label = value.label;
      if (typeof label !== "string" || label.trim().length === 0) {
        return { ok: false, error: "taskLogAdd needs a non-empty label" };
      }
      return { ok: true, value: { name, label } };
    }
    case "taskLogOutput": {
      const reset = value.reset ?? false;
      if (typeof reset !== "boolean") {
        return { ok: false, error: "taskLogOutput reset must be a boolean" };
      }
      const scope = toLogScope(value.scope ?? "long");
      if (scope === undefined) {
        return { ok: false, error: 'taskLogOutput scope must be "block" or "long"' };
      }
      return { ok: true, value: { name, reset, scope } };
    }
    case "pauseBlock":
    case "resumeBlock":
    case "cancelBlock":
    case "taskLogRemove":
      return { ok: true, value: { name } };
  }
}

export function parseClientMessage(raw: string): Parsed<ClientMessage> {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { ok: false, error: "message is not valid JSON" };
  }

  if (!isRecord(data)) return { ok: false, error: "message must be an object" };

  if (data.type === "ping") return { ok: true, value: { type: "ping" } };

  if (data.type === "command") {
    const id = data.id;
    if (id !== undefined && typeof id !== "string") {
      return { ok: false, error: "message id must be a string" };
    }
    const command = parseCommand(data.command);
    if (!command.ok) return command;
    return { ok: true, value: { type: "command", id, command: command.value } };
  }

  return { ok: false, error: `unknown message type ${JSON.stringify(data.type)}` };
}
