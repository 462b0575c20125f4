import {
  clearLine,
  type Coordinates,
  gotoXY,
  headerColor,
  type Key,
  reset,
  truncateVisible,
  type Widget,
  type WidgetCore,
} from "@termtabs/tui";

/**
 * Read-only scrollable text. Scrolls with the arrow keys, `j`/`k`,
 * PageUp/PageDown and Home/End.
 */
export class TextPane implements Widget {
  private lines: string[];
  private offset = 0;
  private visible: string[] = [];

  constructor(
    private readonly core: WidgetCore,
    readonly title: string,
    lines: readonly string[] = []
  ) {
    this.lines = [...lines];
  }

  get scrollOffset(): number {
    return this.offset;
  }

  get lineCount(): number {
    return this.lines.length;
  }

  setLines(lines: readonly string[]): void {
    this.lines = [...lines];
    this.refresh();
  }

  getCore(): WidgetCore {
    return this.core;
  }

  getCoordinates(): Coordinates {
    return this.core.coordinates;
  }

  renderHeader(): string {
    const { xsize } = this.getCoordinates();
    const title = truncateVisible(this.title, xsize);
    return `${headerColor(this.core.theme.header)}${gotoXY(1, 1)}${title}`;
  }

  renderFooter(): string {
    const { x, y, xsize, ysize } = this.getCoordinates();
    const position =
      this.visible.length === 0
        ? "empty"
        : `${this.offset + 1}-${this.offset + this.visible.length}/${this.lines.length}`;
    const status = truncateVisible(`${this.title}  ${position}`, xsize);
    return `${gotoXY(x, y + ysize)}${reset()}${status}`;
  }

  getDrawlist(): string {
    const { x, y, xsize, ysize } = this.getCoordinates();
    let drawlist = "";
    for (let row = 0; row < ysize; row += 1) {
      const line = this.visible[row] ?? "";
      drawlist += `${gotoXY(x, y + row)}${clearLine()}${truncateVisible(line, xsize)}`;
    }
    return drawlist;
  }

  refresh(): void {
    const { ysize } = this.getCoordinates();
    const maxOffset = Math.max(0, this.lines.length - ysize);
    this.offset = Math.min(Math.max(0, this.offset), maxOffset);
    this.visible = this.lines.slice(this.offset, this.offset + ysize);
  }

  onKey(key: Key): void {
    const delta = this.scrollDelta(key);
    if (delta === undefined) {
      return;
    }
    this.offset += delta;
    this.refresh();
  }

  private scrollDelta(key: Key): number | undefined {
    const page = Math.max(1, this.getCoordinates().ysize);
    if (key.kind === "char") {
      if (key.char === "j") {
        return 1;
      }
      if (key.char === "k") {
        return -1;
      }
      return undefined;
    }
    if (key.kind !== "named") {
      return undefined;
    }
    switch (key.name) {
      case "Down":
        return 1;
      case "Up":
        return -1;
      case "PageDown":
        return page;
      case "PageUp":
        return -page;
      case "Home":
        return -this.offset;
      case "End":
        return this.lines.length;
      default:
        return undefined;
    }
  }
}
