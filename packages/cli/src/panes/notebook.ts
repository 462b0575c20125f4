import {
  type Key,
  TabLimitError,
  TabView,
  type TabViewOptions,
  type WidgetCore,
} from "@termtabs/tui";
import { TextPane } from "./textPane";

export const DEFAULT_MAX_TABS = 9;

export interface NotebookOptions extends TabViewOptions {
  maxTabs?: number;
}

/**
 * Tabs of text panes. Control-t opens an `untitled-N` tab and focuses it,
 * control-w closes the focused tab, Tab cycles, and every other key scrolls
 * the focused pane.
 */
export class Notebook extends TabView<TextPane> {
  readonly maxTabs: number;
  private untitled = 0;

  constructor(core: WidgetCore, options: NotebookOptions = {}) {
    super(core, options);
    this.maxTabs = options.maxTabs ?? DEFAULT_MAX_TABS;
  }

  openTab(title: string, lines: readonly string[] = []): TextPane {
    if (this.length >= this.maxTabs) {
      throw new TabLimitError(this.maxTabs);
    }
    const pane = new TextPane(this.core.clone(), title, lines);
    this.push(pane);
    return pane;
  }

  newTab(): void {
    const pane = this.openTab(`untitled-${this.untitled + 1}`);
    this.untitled += 1;
    this.focusTab(this.length - 1);
    this.logger.info("tabs", "Opened tab", { title: pane.title, index: this.active });
  }

  closeTab(): void {
    const pane = this.closeActiveTab();
    this.logger.info("tabs", "Closed tab", { title: pane.title });
  }

  *getTabNames(): Iterable<string | undefined> {
    for (const pane of this.tabs) {
      yield pane.title;
    }
  }

  onKeySub(key: Key): void {
    this.activePane().onKey(key);
  }

  override onNextTab(): void {
    this.logger.debug("tabs", "Switched tab", {
      index: this.active,
      title: this.activePane().title,
    });
  }
}
