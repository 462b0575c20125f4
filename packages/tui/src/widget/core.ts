import type { HeaderStyle } from "../term/escapes";
import type { Coordinates } from "./types";

export type WidgetTheme = {
  header: HeaderStyle;
};

export const DEFAULT_THEME: WidgetTheme = {
  header: { fg: "white", bg: "blue" },
};

export interface WidgetCoreOptions {
  coordinates: Coordinates;
  theme?: WidgetTheme;
}

/**
 * Geometry and styling shared between a container and the panes it hosts.
 * Panes receive a clone, so resizing one never leaks into another.
 */
export class WidgetCore {
  readonly coordinates: Coordinates;
  readonly theme: WidgetTheme;

  constructor(options: WidgetCoreOptions) {
    this.coordinates = { ...options.coordinates };
    this.theme = options.theme
      ? { header: { ...options.theme.header } }
      : { header: { ...DEFAULT_THEME.header } };
  }

  /** Core for a full terminal: header row 1, footer on the last row, body between. */
  static forTerminal(width: number, height: number, theme?: WidgetTheme): WidgetCore {
    return new WidgetCore({
      coordinates: { x: 1, y: 2, xsize: width, ysize: Math.max(0, height - 2) },
      theme,
    });
  }

  clone(): WidgetCore {
    return new WidgetCore({ coordinates: this.coordinates, theme: this.theme });
  }
}
