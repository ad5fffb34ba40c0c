import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createLogger } from "../log.js";
import { DaemonState } from "../state.js";
import { TickLoop } from "../tick-loop.js";
import type { Sampler } from "../window-sampler.js";

const silent = createLogger("test", "error", () => {});

describe("TickLoop", () => {
  let now: number;
  let lines: string[];
  let state: DaemonState;

  beforeEach(() => {
    now = 0;
    lines = [];
    state = new DaemonState({ clock: () => now, sampleIntervalMs: 1000, logger: silent });
    state.activityLog.enable("focus");
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function createLoop(sampler: Sampler): TickLoop {
    return new TickLoop({
      machine: state.machine,
      activityLog: state.activityLog,
      sampler,
      statusLine: state.statusLine,
      write: (line) => lines.push(line),
      clock: () => now,
      intervalMs: 1000,
      logger: silent,
    });
  }

  it("renders idle without sampling", async () => {
    const sampler = { currentFocusedWindowTitle: vi.fn(async () => "Editor") };
    await createLoop(sampler).tick();

    expect(lines).toEqual(["<fc=#AAAAAA>--</fc>"]);
    expect(sampler.currentFocusedWindowTitle).not.toHaveBeenCalled();
  });

  it("samples the focused window while running", async () => {
    const sampler = { currentFocusedWindowTitle: vi.fn(async () => "Editor") };
    const loop = createLoop(sampler);
    state.dispatcher.startBlock(1500);
    now = 1000;

    await loop.tick();

    expect(lines).toEqual(["<fc=#00ff00>24:59</fc>"]);
    expect(sampler.currentFocusedWindowTitle).toHaveBeenCalledTimes(1);
    expect(state.activityLog.dump(false).totals).toEqual([{ label: "Editor", seconds: 1 }]);
  });

  it("does not sample a paused block", async () => {
    const sampler = { currentFocusedWindowTitle: vi.fn(async () => "Editor") };
    const loop = createLoop(sampler);
    state.dispatcher.startBlock(1500);
    state.dispatcher.pauseBlock();

    await loop.tick();

    expect(sampler.currentFocusedWindowTitle).not.toHaveBeenCalled();
    expect(state.activityLog.dump(false).totals).toEqual([]);
  });

  it("moves through cooldown back to idle on wall-clock time", async () => {
    const sampler = { currentFocusedWindowTitle: vi.fn(async () => "Editor") };
    const loop = createLoop(sampler);
    state.dispatcher.startBlock(1500);

    now = 1_500_000;
    await loop.tick();
    expect(state.getStatus()).toMatchObject({ state: "cooldown", remainingSeconds: 300 });

    now = 1_800_000;
    await loop.tick();
    expect(state.getStatus()).toMatchObject({ state: "idle", remainingSeconds: 0 });

    expect(lines).toEqual(["<fc=#ff0000>~05:00</fc>", "<fc=#AAAAAA>--</fc>"]);
    expect(sampler.currentFocusedWindowTitle).not.toHaveBeenCalled();
  });

  it("still writes the line when the sampler fails", async () => {
    const sampler = {
      currentFocusedWindowTitle: vi.fn(async (): Promise<string | null> => {
        throw new Error("xdotool missing");
      }),
    };
    const loop = createLoop(sampler);
    state.dispatcher.startBlock(60);

    await loop.tick();

    expect(lines).toEqual(["<fc=#00ff00>01:00</fc>"]);
    expect(state.activityLog.dump(false).totals).toEqual([]);
  });

  it("drops samples with no window title", async () => {
    const sampler = { currentFocusedWindowTitle: vi.fn(async () => null) };
    const loop = createLoop(sampler);
    state.dispatcher.startBlock(60);

    await loop.tick();

    expect(lines).toHaveLength(1);
    expect(state.activityLog.dump(false).totals).toEqual([]);
  });

  it("keeps ticking while a window query hangs", () => {
    const sampler = {
      currentFocusedWindowTitle: vi.fn(() => new Promise<string | null>(() => {})),
    };
    const loop = createLoop(sampler);
    state.dispatcher.startBlock(60);

    void loop.tick();
    now = 1000;
    void loop.tick();

    expect(lines).toEqual(["<fc=#00ff00>01:00</fc>", "<fc=#00ff00>00:59</fc>"]);
    expect(sampler.currentFocusedWindowTitle).toHaveBeenCalledTimes(1);
  });

  it("drops a sample that arrives after the block was paused", async () => {
    let resolveTitle: (title: string | null) => void = () => {};
    const sampler = {
      currentFocusedWindowTitle: vi.fn(
        () =>
          new Promise<string | null>((resolve) => {
            resolveTitle = resolve;
          })
      ),
    };
    const loop = createLoop(sampler);
    state.dispatcher.startBlock(60);

    const pending = loop.tick();
    state.dispatcher.pauseBlock();
    resolveTitle("Editor");
    await pending;

    expect(state.activityLog.dump(false).totals).toEqual([]);
  });

  it("drops a sample whose query spanned a pause and resume", async () => {
    let resolveTitle: (title: string | null) => void = () => {};
    const sampler = {
      currentFocusedWindowTitle: vi.fn(
        () =>
          new Promise<string | null>((resolve) => {
            resolveTitle = resolve;
          })
      ),
    };
    const loop = createLoop(sampler);
    state.dispatcher.startBlock(60);

    const pending = loop.tick();
    now = 500;
    state.dispatcher.pauseBlock();
    now = 600;
    state.dispatcher.resumeBlock();
    resolveTitle("Editor");
    await pending;

    expect(state.machine.state).toBe("running");
    expect(state.activityLog.dump(false).totals).toEqual([]);
  });

  it("ticks on an interval until stopped", () => {
    vi.useFakeTimers();
    const sampler = { currentFocusedWindowTitle: vi.fn(async () => "Editor") };
    const loop = createLoop(sampler);

    loop.start();
    expect(lines).toHaveLength(1);

    vi.advanceTimersByTime(3000);
    expect(lines).toHaveLength(4);

    loop.stop();
    vi.advanceTimersByTime(3000);
    expect(lines).toHaveLength(4);
  });
});
