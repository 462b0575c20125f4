#!/usr/bin/env node
import { Command } from "commander";
import { configCommand } from "./commands/config";
import { keysCommand } from "./commands/keys";
import { renderCommand } from "./commands/render";
import { writeStderr } from "./utils/terminal";

const program = new Command();

program.name("termtabs").description("Tabbed terminal views").version("0.1.0");

program.addCommand(renderCommand());
program.addCommand(keysCommand());
program.addCommand(configCommand());

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  writeStderr(message);
  process.exit(1);
});
