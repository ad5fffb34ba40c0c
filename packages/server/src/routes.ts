import type { Command, CommandResult, ServerMessage } from "@blockbar/shared";
import { parseClientMessage, parseCommand } from "./protocol.js";
import type { DaemonState } from "./state.js";

export interface HttpReply {
  status: number;
  body: unknown;
}

export interface HttpRequest {
  method: string;
  url: URL;
  // Parsed JSON body, undefined when there was none
  body: unknown;
}

function commandReply(result: CommandResult): HttpReply {
  return { status: result.ok ? 200 : 409, body: result };
}

function run(state: DaemonState, command: Command): HttpReply {
  return commandReply(state.dispatcher.dispatch(command));
}

function readField(body: unknown, field: string): unknown {
  if (typeof body !== "object" || body === null) return undefined;
  return Object.entries(body).find(([key]) => key === field)?.[1];
}

export function routeRequest(state: DaemonState, req: HttpRequest): HttpReply {
  const { method, url, body } = req;

  if (method === "GET" && url.pathname === "/status") {
    return { status: 200, body: state.getStatus() };
  }

  if (method === "POST" && url.pathname === "/block/start") {
    const command = parseCommand({ name: "startBlock", duration: readField(body, "duration") });
    if (!command.ok) return { status: 400, body: { error: command.error } };
    return run(state, command.value);
  }
  if (method === "POST" && url.pathname === "/block/pause") {
    return run(state, { name: "pauseBlock" });
  }
  if (method === "POST" && url.pathname === "/block/resume") {
    return run(state, { name: "resumeBlock" });
  }
  if (method === "POST" && url.pathname === "/block/cancel") {
    return run(state, { name: "cancelBlock" });
  }

  if (url.pathname === "/task-log") {
    if (method === "POST") {
      const command = parseCommand({ name: "taskLogAdd", label: readField(body, "label") });
      if (!command.ok) return { status: 400, body: { error: command.error } };
      return run(state, command.value);
    }
    if (method === "DELETE") {
      return run(state, { name: "taskLogRemove" });
    }
    if (method === "GET") {
      const command = parseCommand({
        name: "taskLogOutput",
        reset: url.searchParams.get("reset") === "true",
        scope: url.searchParams.get("scope") ?? undefined,
      });
      if (!command.ok) return { status: 400, body: { error: command.error } };
      return run(state, command.value);
    }
  }

  if (method === "POST" && url.pathname === "/command") {
    const command = parseCommand(body);
    if (!command.ok) return { status: 400, body: { error: command.error } };
    return run(state, command.value);
  }

  return { status: 404, body: { error: "Not found" } };
}

export function handleClientMessage(state: DaemonState, raw: string): ServerMessage {
  const parsed = parseClientMessage(raw);
  if (!parsed.ok) return { type: "error", message: parsed.error };

  const message = parsed.value;
  if (message.type === "ping") return { type: "pong" };

  return { type: "result", id: message.id, result: state.dispatcher.dispatch(message.command) };
}
