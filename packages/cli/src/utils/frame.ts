import {
  formatKey,
  getLogger,
  type Key,
  reset,
  type TabLogger,
  TabViewError,
  WidgetCore,
  type WidgetTheme,
} from "@termtabs/tui";
import { Notebook } from "../panes/notebook";
import type { RenderFormat } from "./renderOptions";

export type TabSpec = {
  name: string;
  lines: string[];
};

export interface FrameOptions {
  tabs: TabSpec[];
  keys: Key[];
  width: number;
  height: number;
  theme?: WidgetTheme;
  maxTabs?: number;
  logger?: TabLogger;
}

export type RenderedFrame = {
  active: number;
  names: Array<string | undefined>;
  header: string;
  footer: string;
  drawlist: string;
};

/** `name=text`, where `\n` in the text starts a new line. */
export function parseTabSpec(spec: string): TabSpec {
  const separator = spec.indexOf("=");
  const name = (separator === -1 ? spec : spec.slice(0, separator)).trim();
  if (!name) {
    throw new Error(`Tab spec needs a name: ${JSON.stringify(spec)}`);
  }
  const text = separator === -1 ? "" : spec.slice(separator + 1);
  return { name, lines: text ? splitLines(text.replace(/\\n/g, "\n")) : [] };
}

export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Build a notebook from tab specs, replay keys against it and capture the
 * resulting frame. Keys rejected by the tab view (closing the last tab,
 * exceeding the tab limit) are logged and skipped.
 */
export function renderFrame(options: FrameOptions): RenderedFrame {
  const logger = options.logger ?? getLogger();
  const notebook = new Notebook(
    WidgetCore.forTerminal(options.width, options.height, options.theme),
    { id: "frame", logger, maxTabs: options.maxTabs }
  );

  for (const tab of options.tabs) {
    notebook.openTab(tab.name, tab.lines);
  }
  if (notebook.length === 0) {
    notebook.newTab();
  }

  for (const key of options.keys) {
    try {
      notebook.onKey(key);
    } catch (error) {
      if (!(error instanceof TabViewError)) {
        throw error;
      }
      logger.warn("input", `Skipped ${formatKey(key)}: ${error.message}`, {
        code: error.code,
      });
    }
  }

  return {
    active: notebook.active,
    names: Array.from(notebook.getTabNames()),
    header: notebook.renderHeader(),
    footer: notebook.renderFooter(),
    drawlist: notebook.getDrawlist(),
  };
}

export function formatFrame(frame: RenderedFrame, format: RenderFormat): string {
  if (format === "json") {
    return JSON.stringify(frame, null, 2);
  }
  return `${frame.header}${reset()}${frame.drawlist}${frame.footer}${reset()}`;
}
