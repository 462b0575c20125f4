import { char, ctrl, type LogEntry, named, TabLogger } from "@termtabs/tui";
import { describe, expect, it } from "vitest";
import { formatFrame, parseTabSpec, renderFrame, splitLines } from "../utils/frame";

const HEADER_COLOR = "\u001b[37m\u001b[44m";

function createLogger(entries: LogEntry[]): TabLogger {
  return new TabLogger({ console: false, handler: (entry) => entries.push(entry) });
}

const TABS = [
  { name: "notes", lines: ["alpha", "beta", "gamma"] },
  { name: "todo", lines: ["one"] },
];

describe("renderFrame", () => {
  it("replays keys into the focused pane", () => {
    const frame = renderFrame({
      tabs: TABS,
      keys: [named("Down")],
      width: 30,
      height: 4,
      logger: createLogger([]),
    });

    expect(frame).toEqual({
      active: 0,
      names: ["notes", "todo"],
      header:
        `${HEADER_COLOR}\u001b[1;1Hnotes` +
        `${HEADER_COLOR}\u001b[1;16H \u001b[7m0:notes\u001b[0m${HEADER_COLOR} 1:todo`,
      footer: "\u001b[4;1H\u001b[0mnotes  2-3/3",
      drawlist: "\u001b[2;1H\u001b[Kbeta\u001b[3;1H\u001b[Kgamma",
    });
  });

  it("switches tabs with the tab key", () => {
    const frame = renderFrame({
      tabs: TABS,
      keys: [char("\t")],
      width: 30,
      height: 4,
      logger: createLogger([]),
    });

    expect(frame.active).toBe(1);
    expect(frame.footer).toBe("\u001b[4;1H\u001b[0mtodo  1-1/1");
    expect(frame.drawlist).toBe("\u001b[2;1H\u001b[Kone\u001b[3;1H\u001b[K");
  });

  it("starts with an untitled tab when none are given", () => {
    const frame = renderFrame({
      tabs: [],
      keys: [],
      width: 30,
      height: 4,
      logger: createLogger([]),
    });

    expect(frame.names).toEqual(["untitled-1"]);
    expect(frame.active).toBe(0);
  });

  it("skips keys the tab view rejects and logs them", () => {
    const entries: LogEntry[] = [];
    const frame = renderFrame({
      tabs: [{ name: "only", lines: [] }],
      keys: [ctrl("w"), ctrl("t")],
      width: 30,
      height: 4,
      maxTabs: 1,
      logger: createLogger(entries),
    });

    expect(frame.names).toEqual(["only"]);
    const warnings = entries.filter((entry) => entry.level === "warn");
    expect(warnings.map((entry) => entry.message)).toEqual([
      "Skipped C-w: Cannot close the last remaining tab",
      "Skipped C-t: Tab limit of 1 reached",
    ]);
    expect(warnings[0].data).toEqual({ code: "LAST_TAB" });
  });

  it("formats frames as text or json", () => {
    const frame = {
      active: 0,
      names: ["a"],
      header: "H",
      footer: "F",
      drawlist: "D",
    };

    expect(formatFrame(frame, "text")).toBe("H\u001b[0mDF\u001b[0m");
    expect(JSON.parse(formatFrame(frame, "json"))).toEqual(frame);
  });
});

describe("tab specs", () => {
  it("splits name and text on the first equals sign", () => {
    expect(parseTabSpec("notes=a\\nb=c")).toEqual({ name: "notes", lines: ["a", "b=c"] });
    expect(parseTabSpec(" spaced = text")).toEqual({ name: "spaced", lines: [" text"] });
  });

  it("accepts a bare name", () => {
    expect(parseTabSpec("scratch")).toEqual({ name: "scratch", lines: [] });
  });

  it("requires a name", () => {
    expect(() => parseTabSpec("=text")).toThrow("Tab spec needs a name");
  });

  it("splits input into lines without a trailing empty line", () => {
    expect(splitLines("a\r\nb\n")).toEqual(["a", "b"]);
    expect(splitLines("")).toEqual([]);
  });
});
