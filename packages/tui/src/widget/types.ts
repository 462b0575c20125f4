import type { Key } from "../input/keys";
import type { WidgetCore } from "./core";

/** A rectangle of terminal cells. `x` and `y` are 1-based. */
export type Coordinates = {
  x: number;
  y: number;
  xsize: number;
  ysize: number;
};

/**
 * Rendering and input contract shared by every pane, including containers.
 *
 * Any method may throw; callers propagate the error unless they document that
 * they log it instead.
 */
export interface Widget {
  getCore(): WidgetCore;
  getCoordinates(): Coordinates;
  renderHeader(): string;
  renderFooter(): string;
  /** Ready-to-paint representation of the current state. */
  getDrawlist(): string;
  /** Re-derive cached display state. Safe to call repeatedly. */
  refresh(): void;
  onKey(key: Key): void;
}
