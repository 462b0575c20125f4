import path from "node:path";
import { fileURLToPath } from "node:url";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

// Workspace packages resolve to their TypeScript sources, so tests need no build.
export const aliases = [
  {
    find: "@termtabs/tui",
    replacement: path.resolve(rootDir, "packages/tui/src/index.ts"),
  },
];
