import { defineConfig, defineProject } from "vitest/config";

import { aliases } from "./vitest.aliases";

const defaultExclude = ["**/node_modules/**", "**/dist/**", "**/coverage/**"];

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    environment: "node",
    exclude: defaultExclude,
    projects: [
      defineProject({
        resolve: {
          alias: aliases,
        },
        test: {
          name: "tui",
          include: ["packages/tui/src/**/*.test.ts"],
          exclude: defaultExclude,
          environment: "node",
        },
      }),
      defineProject({
        resolve: {
          alias: aliases,
        },
        test: {
          name: "cli",
          include: ["packages/cli/src/**/*.test.ts"],
          exclude: defaultExclude,
          environment: "node",
        },
      }),
    ],
  },
});
