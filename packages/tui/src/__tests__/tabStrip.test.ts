import { describe, expect, it } from "vitest";
import { formatTabLabel, layoutTabStrip, renderTabStrip } from "../tabs/tabStrip";

const STYLE = { fg: "white", bg: "blue" } as const;
const HEADER_COLOR = "\u001b[37m\u001b[44m";

describe("tab strip layout", () => {
  it("formats labels with and without names", () => {
    expect(formatTabLabel(3, "logs")).toBe("3:logs");
    expect(formatTabLabel(3, undefined)).toBe("3");
  });

  it("right-aligns the run so it ends on the last column", () => {
    const layout = layoutTabStrip({ names: ["a", "b", "c"], active: 1, width: 20, style: STYLE });

    expect(layout.labels).toEqual(["0:a", "1:b", "2:c"]);
    expect(layout.printableLength).toBe(12);
    expect(layout.column).toBe(9);
    expect(layout.column + layout.printableLength - 1).toBe(20);
    expect(layout.run).toBe(` 0:a \u001b[7m1:b\u001b[0m${HEADER_COLOR} 2:c`);
  });

  it("starts at column 1 when the run is wider than the header", () => {
    const layout = layoutTabStrip({
      names: ["alpha", "beta"],
      active: 0,
      width: 5,
      style: STYLE,
    });

    expect(layout.printableLength).toBe(15);
    expect(layout.column).toBe(1);
  });

  it("renders the index alone for unnamed tabs", () => {
    const layout = layoutTabStrip({
      names: [undefined, "b"],
      active: 0,
      width: 10,
      style: STYLE,
    });

    expect(layout.run).toBe(` \u001b[7m0\u001b[0m${HEADER_COLOR} 1:b`);
    expect(layout.printableLength).toBe(6);
  });

  it("prefixes the header colour and cursor move", () => {
    expect(renderTabStrip({ names: ["x"], active: 0, width: 10, style: STYLE, row: 2 })).toBe(
      `${HEADER_COLOR}\u001b[2;7H \u001b[7m0:x\u001b[0m${HEADER_COLOR}`
    );
  });
});
