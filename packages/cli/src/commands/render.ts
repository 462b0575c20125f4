import { parseKeySpecs, TabLogger } from "@termtabs/tui";
import { Command, InvalidArgumentError } from "commander";
import { ConfigStore, themeFromConfig } from "../utils/configStore";
import { formatFrame, parseTabSpec, renderFrame, splitLines, type TabSpec } from "../utils/frame";
import {
  HEIGHT_ENV,
  MIN_HEIGHT,
  parseHeight,
  parsePositiveInteger,
  resolveDimension,
  resolveFormat,
  WIDTH_ENV,
} from "../utils/renderOptions";
import { readStdin, writeStdout } from "../utils/terminal";

type RenderCommandOptions = {
  tab: TabSpec[];
  stdinTab?: string;
  keys?: string;
  width?: number;
  height?: number;
  format?: string;
};

export function renderCommand(): Command {
  return new Command("render")
    .description("Render one frame of a tab view after replaying keys")
    .option("-t, --tab <spec>", "Add a tab as name=text (repeatable)", collectTab, [])
    .option("--stdin-tab <name>", "Add a tab holding standard input")
    .option("-k, --keys <keys>", 'Keys to replay, e.g. "C-t Tab Down"')
    .option("-w, --width <n>", "Terminal width", parsePositiveInteger)
    .option("-H, --height <n>", "Terminal height", parseHeight)
    .option("-f, --format <format>", "Output format (text|json)", "text")
    .action(async (options: RenderCommandOptions) => {
      const config = await new ConfigStore().load();
      const logger = new TabLogger({ minLevel: config.logLevel });

      const tabs = [...options.tab];
      if (options.stdinTab) {
        tabs.push({ name: options.stdinTab, lines: splitLines(await readStdin()) });
      }

      const frame = renderFrame({
        tabs,
        keys: options.keys ? parseKeySpecs(options.keys) : [],
        width: resolveDimension(options.width, WIDTH_ENV, config.width),
        height: resolveDimension(options.height, HEIGHT_ENV, config.height, MIN_HEIGHT),
        theme: themeFromConfig(config),
        maxTabs: config.maxTabs,
        logger,
      });
      writeStdout(formatFrame(frame, resolveFormat(options.format)));
    });
}

function collectTab(value: string, previous: TabSpec[]): TabSpec[] {
  try {
    return [...previous, parseTabSpec(value)];
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}
