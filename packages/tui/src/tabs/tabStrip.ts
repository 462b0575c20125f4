import {
  gotoXY,
  headerColor,
  type HeaderStyle,
  invert,
  reset,
  visibleLength,
} from "../term/escapes";

export type TabStripInput = {
  names: ReadonlyArray<string | undefined>;
  active: number;
  /** Width of the header in cells. */
  width: number;
  style: HeaderStyle;
  /** Header row, 1-based. */
  row?: number;
};

export type TabStripLayout = {
  labels: string[];
  /** Labels joined with their separators and highlight escapes. */
  run: string;
  /** Cells the run occupies once escapes are removed. */
  printableLength: number;
  /** 1-based column where the run starts. */
  column: number;
};

export function formatTabLabel(index: number, name: string | undefined): string {
  return name === undefined ? `${index}` : `${index}:${name}`;
}

/**
 * Lay out the tab strip so its last cell lands on column `width`.
 * A run wider than the header starts at column 1 and runs past the edge.
 */
export function layoutTabStrip(input: TabStripInput): TabStripLayout {
  const base = headerColor(input.style);
  const labels = input.names.map((name, index) => formatTabLabel(index, name));

  let printableLength = 0;
  const pieces = labels.map((label, index) => {
    printableLength += 1 + visibleLength(label);
    if (index === input.active) {
      return ` ${invert()}${label}${reset()}${base}`;
    }
    return ` ${label}`;
  });

  return {
    labels,
    run: pieces.join(""),
    printableLength,
    column: Math.max(1, input.width - printableLength + 1),
  };
}

export function renderTabStrip(input: TabStripInput): string {
  const layout = layoutTabStrip(input);
  return `${headerColor(input.style)}${gotoXY(layout.column, input.row ?? 1)}${layout.run}`;
}
