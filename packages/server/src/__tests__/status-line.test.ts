import { describe, it, expect, beforeEach } from "vitest";
import type { StatusSnapshot } from "@blockbar/shared";
import { fadeBetween, parseHexColor } from "../color.js";
import { DEFAULT_DISPLAY_CONFIG } from "../config.js";
import { StatusLine } from "../status-line.js";

function snapshot(overrides: Partial<StatusSnapshot>): StatusSnapshot {
  return {
    state: "idle",
    remainingMs: 0,
    remainingSeconds: 0,
    blockDurationSeconds: null,
    elapsedFraction: 0,
    ...overrides,
  };
}

describe("color", () => {
  it("parses short and long hex colors", () => {
    expect(parseHexColor("#0af")).toEqual([0, 170, 255]);
    expect(parseHexColor("#00AAFF")).toEqual([0, 170, 255]);
    expect(() => parseHexColor("blue")).toThrow('not a hex color: "blue"');
  });

  it("fades quadratically by elapsed fraction", () => {
    expect(fadeBetween("#00FF00", "#FFFF00", 0)).toBe("#00ff00");
    expect(fadeBetween("#00FF00", "#FFFF00", 0.5)).toBe("#40ff00");
    expect(fadeBetween("#00FF00", "#FFFF00", 1)).toBe("#ffff00");
  });

  it("clamps the fraction", () => {
    expect(fadeBetween("#000000", "#FFFFFF", 2)).toBe("#ffffff");
    expect(fadeBetween("#000000", "#FFFFFF", -1)).toBe("#000000");
  });
});

describe("StatusLine", () => {
  let line: StatusLine;

  beforeEach(() => {
    line = new StatusLine(DEFAULT_DISPLAY_CONFIG);
  });

  it("renders idle as a grey placeholder", () => {
    expect(line.render(snapshot({}))).toBe("<fc=#AAAAAA>--</fc>");
  });

  it("renders a paused block in grey", () => {
    expect(line.render(snapshot({ state: "paused", remainingSeconds: 754 }))).toBe("<fc=#AAAAAA>12:34</fc>");
  });

  it("fades a running block with its progress", () => {
    expect(line.render(snapshot({ state: "running", remainingSeconds: 1500 }))).toBe("<fc=#00ff00>25:00</fc>");
    expect(line.render(snapshot({ state: "running", remainingSeconds: 750, elapsedFraction: 0.5 }))).toBe(
      "<fc=#40ff00>12:30</fc>"
    );
  });

  it("prints minutes past an hour", () => {
    expect(line.render(snapshot({ state: "running", remainingSeconds: 7200 }))).toBe("<fc=#00ff00>120:00</fc>");
  });

  it("blinks on odd seconds of the final countdown", () => {
    expect(line.render(snapshot({ state: "running", remainingSeconds: 9, elapsedFraction: 0.99 }))).toBe(
      "<fc=#faff00,#FFFF00>00:09</fc>"
    );
    expect(line.render(snapshot({ state: "running", remainingSeconds: 8, elapsedFraction: 0.99 }))).toBe(
      "<fc=#faff00>00:08</fc>"
    );
  });

  it("marks the cooldown", () => {
    expect(line.render(snapshot({ state: "cooldown", remainingSeconds: 300 }))).toBe("<fc=#ff0000>~05:00</fc>");
  });

  it("flashes a warning for five renders", () => {
    line.flash("warning");
    const frames = Array.from({ length: 6 }, () => line.render(snapshot({})));
    expect(frames).toEqual([
      "<fc=#AAAAAA,#FFFF00>--</fc>",
      "<fc=#AAAAAA>--</fc>",
      "<fc=#AAAAAA,#FFFF00>--</fc>",
      "<fc=#AAAAAA>--</fc>",
      "<fc=#AAAAAA,#FFFF00>--</fc>",
      "<fc=#AAAAAA>--</fc>",
    ]);
  });

  it("flashes an error for seven renders", () => {
    line.flash("error");
    const frames = Array.from({ length: 8 }, () => line.render(snapshot({})));
    expect(frames.filter((f) => f === "<fc=#AAAAAA,#FF0000>--</fc>")).toHaveLength(4);
    expect(frames[7]).toBe("<fc=#AAAAAA>--</fc>");
  });

  it("lets the error flash win over a warning", () => {
    line.flash("warning");
    line.flash("error");
    expect(line.render(snapshot({}))).toBe("<fc=#AAAAAA,#FF0000>--</fc>");
  });
});
