import type { Key } from "../input/keys";
import { TabLogger } from "../observability/logger";
import type { LogEntry } from "../observability/types";
import { type TabViewOptions, TabView } from "../tabs/tabView";
import { WidgetCore } from "../widget/core";
import type { Coordinates, Widget } from "../widget/types";

export class FakePane implements Widget {
  readonly keys: Key[] = [];
  refreshCount = 0;
  refreshError: Error | undefined;
  private readonly core: WidgetCore;

  constructor(
    readonly name: string,
    core: WidgetCore = createCore()
  ) {
    this.core = core.clone();
  }

  getCore(): WidgetCore {
    return this.core;
  }

  getCoordinates(): Coordinates {
    return this.core.coordinates;
  }

  renderHeader(): string {
    return `[${this.name}]`;
  }

  renderFooter(): string {
    return `footer:${this.name}`;
  }

  getDrawlist(): string {
    return `draw:${this.name}`;
  }

  refresh(): void {
    if (this.refreshError) {
      throw this.refreshError;
    }
    this.refreshCount += 1;
  }

  onKey(key: Key): void {
    this.keys.push(key);
  }
}

export class TestTabs extends TabView<FakePane> {
  hook: () => void = () => {};
  hookCalls = 0;
  private created = 0;

  newTab(): void {
    this.created += 1;
    this.push(new FakePane(`new${this.created}`, this.core));
  }

  closeTab(): void {
    this.closeActiveTab();
  }

  *getTabNames(): Iterable<string | undefined> {
    for (const pane of this.tabs) {
      yield pane.name;
    }
  }

  onKeySub(key: Key): void {
    this.activePane().onKey(key);
  }

  override onNextTab(): void {
    this.hookCalls += 1;
    this.hook();
  }
}

export function createCore(xsize = 40): WidgetCore {
  return new WidgetCore({ coordinates: { x: 1, y: 2, xsize, ysize: 10 } });
}

export function createLogger(entries: LogEntry[]): TabLogger {
  return new TabLogger({
    minLevel: "debug",
    console: false,
    handler: (entry) => entries.push(entry),
  });
}

export function createTabs(
  names: string[],
  options: TabViewOptions & { xsize?: number } = {}
): TestTabs {
  const core = createCore(options.xsize);
  const tabs = new TestTabs(core, {
    id: options.id ?? "test",
    logger: options.logger ?? new TabLogger({ console: false }),
  });
  for (const name of names) {
    tabs.push(new FakePane(name, core));
  }
  return tabs;
}
