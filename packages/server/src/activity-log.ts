import type { BlockState, LogScope } from "@blockbar/shared";
import { TICK_INTERVAL_MS } from "@blockbar/shared";
import { LABEL_SEPARATOR, titleToPath } from "./classify.js";
import type { Clock, Transition, TransitionEvent } from "./timer.js";

export interface ActivityTotal {
  label: string;
  seconds: number;
}

export interface ActivityEntry {
  label: string;
  startedAt: number;
  durationMs: number;
}

/** One level of a title path, with the time of everything below it. */
export interface ActivityNode {
  name: string;
  seconds: number;
  children: ActivityNode[];
}

export interface JournalLine {
  at: number;
  text: string;
}

export interface ActivityDump {
  scope: LogScope;
  name: string | null;
  enabled: boolean;
  totals: ActivityTotal[];
  entries: ActivityEntry[];
  // Top-level nodes, largest first
  rollup: ActivityNode[];
  journal: JournalLine[];
}

export interface ActivityLogOptions {
  clock?: Clock;
  // Expected spacing between samples; gaps much longer than this are not credited
  sampleIntervalMs?: number;
}

export const JOURNAL_LIMIT = 100;

const journalText: Record<TransitionEvent, string> = {
  start: "started block",
  pause: "paused block",
  resume: "unpaused block",
  cancel: "canceled block",
  "block-end": "end block; start cooldown",
  "cooldown-end": "end cooldown",
};

interface TallyNode {
  ms: number;
  // Map keeps first-seen order, which breaks ties when sorting
  children: Map<string, TallyNode>;
}

function emptyNode(): TallyNode {
  return { ms: 0, children: new Map() };
}

function toActivityNodes(node: TallyNode): ActivityNode[] {
  return Array.from(node.children, ([name, child]) => ({
    name,
    ms: child.ms,
    node: child,
  }))
    .sort((a, b) => b.ms - a.ms)
    .map(({ name, ms, node: child }) => ({
      name,
      seconds: ms / 1000,
      children: toActivityNodes(child),
    }));
}

/** Accumulated time for one scope: flat label totals, label runs and the path rollup. */
class Tally {
  private totals: Map<string, number> = new Map();
  private entries: ActivityEntry[] = [];
  private root: TallyNode = emptyNode();

  add(path: string[], at: number, durationMs: number): void {
    const label = path.join(LABEL_SEPARATOR);
    this.totals.set(label, (this.totals.get(label) ?? 0) + durationMs);

    const last = this.entries[this.entries.length - 1];
    if (last && last.label === label) {
      last.durationMs += durationMs;
    } else {
      this.entries.push({ label, startedAt: at - durationMs, durationMs });
    }

    let node = this.root;
    node.ms += durationMs;
    for (const part of path) {
      let child = node.children.get(part);
      if (!child) {
        child = emptyNode();
        node.children.set(part, child);
      }
      child.ms += durationMs;
      node = child;
    }
  }

  snapshot(): Pick<ActivityDump, "totals" | "entries" | "rollup"> {
    return {
      totals: Array.from(this.totals, ([label, ms]) => ({ label, seconds: ms / 1000 })),
      entries: this.entries.map((entry) => ({ ...entry })),
      rollup: toActivityNodes(this.root),
    };
  }
}

export class ActivityLog {
  private enabled = false;
  private name: string | null = null;
  // "block" is cleared whenever a block starts; "long" only by enable or a reset dump
  private tallies: Record<LogScope, Tally> = { block: new Tally(), long: new Tally() };
  private journal: JournalLine[] = [];
  private lastSampleAt: number | null = null;
  private readonly clock: Clock;
  private readonly sampleIntervalMs: number;

  constructor(options: ActivityLogOptions = {}) {
    this.clock = options.clock ?? Date.now;
    this.sampleIntervalMs = options.sampleIntervalMs ?? TICK_INTERVAL_MS;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  get currentName(): string | null {
    return this.name;
  }

  enable(name: string): void {
    this.enabled = true;
    this.name = name;
    this.tallies = { block: new Tally(), long: new Tally() };
    this.lastSampleAt = null;
  }

  disable(): void {
    this.enabled = false;
    this.lastSampleAt = null;
  }

  /**
   * Credits the time since the previous sample to the label derived from the
   * window title. Returns false when the sample was dropped.
   */
  sample(rawTitle: string, at: number, state: BlockState): boolean {
    if (!this.enabled || state !== "running") {
      this.lastSampleAt = null;
      return false;
    }

    const title = rawTitle.trim();
    if (title.length === 0) return false;

    const gap = this.lastSampleAt === null ? null : at - this.lastSampleAt;
    const durationMs =
      gap !== null && gap >= 0 && gap <= 2 * this.sampleIntervalMs ? gap : this.sampleIntervalMs;
    this.lastSampleAt = at;

    const path = titleToPath(title);
    this.tallies.block.add(path, at, durationMs);
    this.tallies.long.add(path, at, durationMs);
    return true;
  }

  recordTransition(transition: Transition): void {
    if (transition.event === "start") {
      this.journal = [];
      this.tallies.block = new Tally();
    }
    if (transition.to !== "running") {
      this.lastSampleAt = null;
    }
    this.note(journalText[transition.event], transition.at);
  }

  dump(reset: boolean, scope: LogScope = "long"): ActivityDump {
    const subject = scope === "block" ? "block statistics" : "statistics";
    this.note(reset ? `reset ${subject}` : `output ${subject} (did not reset)`, this.clock());

    const dump: ActivityDump = {
      scope,
      name: this.name,
      enabled: this.enabled,
      ...this.tallies[scope].snapshot(),
      journal: [...this.journal],
    };

    if (reset) {
      this.tallies[scope] = new Tally();
      this.lastSampleAt = null;
    }
    return dump;
  }

  private note(text: string, at: number): void {
    // Repeated polling leaves a single line
    if (this.journal[this.journal.length - 1]?.text === text) return;
    this.journal.push({ at, text });
    if (this.journal.length > JOURNAL_LIMIT) {
      this.journal.splice(0, this.journal.length - JOURNAL_LIMIT);
    }
  }
}

function pad(value: string, width: number): string {
  return value.length >= width ? value : " ".repeat(width - value.length) + value;
}

function share(seconds: number, totalSeconds: number): string {
  const percent = totalSeconds > 0 ? (100 * seconds) / totalSeconds : 0;
  return `[${pad(percent.toFixed(2), 6)}% ${pad(seconds.toFixed(2), 8)}s]`;
}

function formatNodes(nodes: ActivityNode[], depth: number, totalSeconds: number, lines: string[]): void {
  for (const node of nodes) {
    lines.push(`${" ".repeat(depth * 4)}- ${share(node.seconds, totalSeconds)} ${node.name}`);
    formatNodes(node.children, depth + 1, totalSeconds, lines);
  }
}

export function formatDump(dump: ActivityDump): string {
  const lines: string[] = [];
  const kind = dump.scope === "block" ? "block log" : "task log";
  const header = dump.name === null ? kind : `${kind} "${dump.name}"`;
  lines.push(`${header} (${dump.enabled ? "enabled" : "disabled"})`);

  for (const line of dump.journal) {
    lines.push(`${new Date(line.at).toISOString()}: ${line.text}`);
  }

  const totalSeconds = dump.totals.reduce((sum, total) => sum + total.seconds, 0);
  lines.push("totals:");
  for (const total of dump.totals) {
    lines.push(`- ${share(total.seconds, totalSeconds)} ${total.label}`);
  }

  lines.push("by source:");
  formatNodes(dump.rollup, 0, totalSeconds, lines);

  lines.push("timeline:");
  for (const entry of dump.entries) {
    lines.push(
      `- ${new Date(entry.startedAt).toISOString()} ${pad((entry.durationMs / 1000).toFixed(2), 8)}s ${entry.label}`
    );
  }

  return lines.join("\n") + "\n";
}
