/**
 * Generic tab container.
 *
 * Holds an ordered list of panes of one type, tracks the active one, and acts
 * as a widget itself by delegating to that pane. The header is the active
 * pane's header with the tab strip drawn over its right edge.
 *
 * Subclasses decide how tabs are created, closed and named, and where
 * non-reserved keys go.
 *
 * @example
 * ```typescript
 * class Editors extends TabView<EditorPane> {
 *   newTab() { this.push(new EditorPane(this.getCore().clone())); }
 *   closeTab() { this.closeActiveTab(); }
 *   *getTabNames() { for (const pane of this.tabs) yield pane.fileName; }
 *   onKeySub(key: Key) { this.activePane().onKey(key); }
 * }
 * ```
 */

import { EmptyTabViewError, LastTabError, TabIndexError, TabNameMismatchError } from "../errors";
import { formatKey, type Key } from "../input/keys";
import { getLogger, type TabLogger } from "../observability/logger";
import { attempt, isErr } from "../result";
import type { WidgetCore } from "../widget/core";
import type { Coordinates, Widget } from "../widget/types";
import { dispatchTabKey, type Tabbable } from "./tabbable";
import { renderTabStrip } from "./tabStrip";

export interface TabViewOptions {
  /** Identifier attached to log entries. */
  id?: string;
  logger?: TabLogger;
}

export abstract class TabView<T extends Widget> implements Widget, Tabbable {
  protected readonly widgets: T[] = [];
  protected readonly core: WidgetCore;
  protected readonly logger: TabLogger;
  private activeIndex = 0;

  constructor(core: WidgetCore, options: TabViewOptions = {}) {
    this.core = core.clone();
    this.logger = (options.logger ?? getLogger()).child({ viewId: options.id ?? "tabs" });
  }

  abstract newTab(): void;
  abstract closeTab(): void;
  abstract getTabNames(): Iterable<string | undefined>;
  abstract onKeySub(key: Key): void;

  nextTab(): void {
    this.advanceTab();
  }

  onNextTab(): void {}

  get tabs(): readonly T[] {
    return this.widgets;
  }

  get active(): number {
    return this.activeIndex;
  }

  get length(): number {
    return this.widgets.length;
  }

  /**
   * Append a pane and refresh the active one. The pane only becomes active
   * when the view was empty.
   */
  push(pane: T): void {
    const previousActive = this.activeIndex;
    if (this.widgets.length === 0) {
      this.activeIndex = 0;
    }
    this.widgets.push(pane);
    try {
      this.refresh();
    } catch (error) {
      this.widgets.pop();
      this.activeIndex = previousActive;
      throw error;
    }
  }

  /** Remove the last pane. The active index is left for the caller to reconcile. */
  pop(): T {
    const pane = this.widgets.pop();
    if (pane === undefined) {
      throw new EmptyTabViewError("pop a tab");
    }
    return pane;
  }

  /**
   * Remove the active pane. The next pane slides into its place; closing the
   * rightmost tab selects its left neighbour. The last remaining tab cannot
   * be closed.
   */
  closeActiveTab(): T {
    if (this.widgets.length === 0) {
      throw new EmptyTabViewError("close a tab");
    }
    if (this.widgets.length === 1) {
      throw new LastTabError();
    }
    const index = this.checkedActiveIndex();
    const [removed] = this.widgets.splice(index, 1);
    this.activeIndex = Math.min(index, this.widgets.length - 1);
    try {
      this.refresh();
    } catch (error) {
      this.widgets.splice(index, 0, removed);
      this.activeIndex = index;
      throw error;
    }
    this.logger.debug("tabs", "Closed tab", { closed: index, active: this.activeIndex });
    return removed;
  }

  /** Move to the next tab, wrapping to the first, then run the post-switch hook. */
  advanceTab(): void {
    if (this.widgets.length === 0) {
      throw new EmptyTabViewError("switch tabs");
    }
    this.activeIndex = this.activeIndex + 1 >= this.widgets.length ? 0 : this.activeIndex + 1;
    this.runSwitchHook();
  }

  focusTab(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.widgets.length) {
      throw new TabIndexError(index, this.widgets.length);
    }
    this.activeIndex = index;
    this.refresh();
  }

  activePane(): T {
    return this.widgets[this.checkedActiveIndex()];
  }

  activeTab(): Widget {
    return this.activePane();
  }

  getCore(): WidgetCore {
    return this.core;
  }

  getCoordinates(): Coordinates {
    return this.core.coordinates;
  }

  renderHeader(): string {
    const header = this.activePane().renderHeader();
    const names = Array.from(this.getTabNames());
    if (names.length !== this.widgets.length) {
      throw new TabNameMismatchError(names.length, this.widgets.length);
    }
    const strip = renderTabStrip({
      names,
      active: this.activeIndex,
      width: this.getCoordinates().xsize,
      style: this.core.theme.header,
    });
    return `${header}${strip}`;
  }

  renderFooter(): string {
    return this.activePane().renderFooter();
  }

  getDrawlist(): string {
    return this.activePane().getDrawlist();
  }

  refresh(): void {
    this.activePane().refresh();
  }

  onKey(key: Key): void {
    const label = formatKey(key);
    const outcome = dispatchTabKey(this, key);
    this.logger
      .child({ key: label, tabIndex: this.activeIndex })
      .debug("input", `${label} -> ${outcome}`);
    this.refresh();
  }

  // Hook failures are logged and dropped; the index has already moved.
  private runSwitchHook(): void {
    const outcome = attempt(() => this.onNextTab());
    if (isErr(outcome)) {
      this.logger.error("tabs", "Post-switch hook failed", outcome.error, {
        active: this.activeIndex,
      });
    }
  }

  private checkedActiveIndex(): number {
    if (this.activeIndex < 0 || this.activeIndex >= this.widgets.length) {
      throw new TabIndexError(this.activeIndex, this.widgets.length);
    }
    return this.activeIndex;
  }
}
