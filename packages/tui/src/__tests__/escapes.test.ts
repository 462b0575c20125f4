import { describe, expect, it } from "vitest";
import {
  bg,
  clearLine,
  fg,
  gotoXY,
  headerColor,
  invert,
  reset,
  stripEscapes,
  truncateVisible,
  visibleLength,
} from "../term/escapes";

describe("terminal escapes", () => {
  it("builds SGR sequences", () => {
    expect(invert()).toBe("\u001b[7m");
    expect(reset()).toBe("\u001b[0m");
    expect(fg("red")).toBe("\u001b[31m");
    expect(bg("red")).toBe("\u001b[41m");
    expect(headerColor({ fg: "black", bg: "cyan" })).toBe("\u001b[30m\u001b[46m");
  });

  it("moves the cursor to 1-based cells", () => {
    expect(gotoXY(5, 1)).toBe("\u001b[1;5H");
    expect(gotoXY(0, -3)).toBe("\u001b[1;1H");
    expect(clearLine()).toBe("\u001b[K");
  });

  it("measures text without escape sequences", () => {
    const styled = `${invert()}1:b${reset()}${gotoXY(3, 4)}ü`;

    expect(stripEscapes(styled)).toBe("1:bü");
    expect(visibleLength(styled)).toBe(4);
  });

  it("truncates by code point", () => {
    expect(truncateVisible("tabs😀view", 5)).toBe("tabs😀");
    expect(truncateVisible("short", 10)).toBe("short");
    expect(truncateVisible("anything", 0)).toBe("");
  });
});
