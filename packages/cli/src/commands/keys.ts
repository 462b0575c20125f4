import { formatKey, parseKeySequence } from "@termtabs/tui";
import { Command } from "commander";
import { readStdin, writeStdout } from "../utils/terminal";

export function keysCommand(): Command {
  return new Command("keys")
    .description("Decode raw terminal input from stdin into key labels")
    .action(async () => {
      const input = await readStdin();
      const labels = parseKeySequence(input).map(formatKey);
      writeStdout(labels.join(" "));
    });
}
