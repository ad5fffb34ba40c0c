import { createServer, type IncomingMessage, type ServerResponse } from "http";
import { WebSocketServer, WebSocket } from "ws";
import { DEFAULT_PORT, TICK_INTERVAL_MS } from "@blockbar/shared";
import { DEFAULT_DISPLAY_CONFIG, type DisplayConfig } from "./config.js";
import { createLogger, describeError } from "./log.js";
import { handleClientMessage, routeRequest } from "./routes.js";
import { DetachedShellRunner } from "./shell-runner.js";
import { DaemonState } from "./state.js";
import { TickLoop } from "./tick-loop.js";
import { XdotoolSampler, type Sampler } from "./window-sampler.js";

export interface ServerOptions {
  port?: number;
  config?: DisplayConfig;
  intervalMs?: number;
  sampler?: Sampler;
  write?: (line: string) => void;
}

const MAX_BODY_BYTES = 16 * 1024;

const log = createLogger("blockbar");

function sendJson(res: ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(data));
}

function readJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new Error("Request body too large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      const text = Buffer.concat(chunks).toString("utf8").trim();
      if (text.length === 0) {
        resolve(undefined);
        return;
      }
      try {
        resolve(JSON.parse(text));
      } catch {
        reject(new Error("Request body is not valid JSON"));
      }
    });
    req.on("error", reject);
  });
}

function writeStatusLine(line: string): void {
  process.stdout.write(line + "\n");
}

export function startServer(options: ServerOptions = {}): void {
  const port = options.port ?? DEFAULT_PORT;
  const config = options.config ?? DEFAULT_DISPLAY_CONFIG;
  const intervalMs = options.intervalMs ?? TICK_INTERVAL_MS;

  const state = new DaemonState({
    config,
    shell: new DetachedShellRunner(),
    sampleIntervalMs: intervalMs,
  });
  const loop = new TickLoop({
    machine: state.machine,
    activityLog: state.activityLog,
    sampler: options.sampler ?? new XdotoolSampler(),
    statusLine: state.statusLine,
    write: options.write ?? writeStatusLine,
    intervalMs,
  });

  const server = createServer(async (req, res) => {
    // CORS headers for local tools
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url || "/", `http://localhost:${port}`);

    let body: unknown;
    try {
      body = await readJsonBody(req);
    } catch (e) {
      sendJson(res, { error: describeError(e) }, 400);
      return;
    }

    const reply = routeRequest(state, { method: req.method ?? "GET", url, body });
    sendJson(res, reply.body, reply.status);
  });

  // WebSocket command channel
  const wss = new WebSocketServer({ server, path: "/ws" });

  wss.on("connection", (ws: WebSocket) => {
    log.info("client connected");

    // Push a status message on every transition
    const unsubscribe = state.subscribe((message) => {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(JSON.stringify(message));
      }
    });

    ws.on("message", (data) => {
      ws.send(JSON.stringify(handleClientMessage(state, data.toString())));
    });

    ws.on("close", () => {
      log.info("client disconnected");
      unsubscribe();
    });

    ws.on("error", (e) => {
      log.warn(`client error: ${describeError(e)}`);
      unsubscribe();
    });
  });

  server.on("error", (e) => {
    log.error(`server error: ${describeError(e)}`);
    shutdown(1);
  });

  // The status bar host went away
  process.stdout.on("error", (e) => {
    log.error(`stdout closed: ${describeError(e)}`);
    shutdown(0);
  });

  loop.start();

  server.listen(port, "127.0.0.1", () => {
    log.info(`control surface on http://127.0.0.1:${port} and ws://127.0.0.1:${port}/ws`);
  });

  let stopping = false;
  function shutdown(code: number): void {
    if (stopping) return;
    stopping = true;
    log.info("shutting down...");
    loop.stop();
    state.destroy();
    wss.close();
    server.close();
    process.exit(code);
  }

  // Use once to prevent stacking handlers
  process.once("SIGINT", () => shutdown(0));
  process.once("SIGTERM", () => shutdown(0));
}
