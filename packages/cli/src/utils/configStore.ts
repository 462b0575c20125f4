import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { ANSI_COLORS, getLogger, LOG_LEVELS, type WidgetTheme } from "@termtabs/tui";
import { z } from "zod";
import { MIN_HEIGHT } from "./renderOptions";
import { ensureCliStateDir, resolveCliPath } from "./statePaths";

export const CONFIG_FILE_NAME = "termtabs.json";

export const cliConfigSchema = z.object({
  width: z.number().int().positive().default(80),
  height: z.number().int().min(MIN_HEIGHT).default(24),
  headerFg: z.enum(ANSI_COLORS).default("white"),
  headerBg: z.enum(ANSI_COLORS).default("blue"),
  maxTabs: z.number().int().positive().default(9),
  logLevel: z.enum(LOG_LEVELS).default("warn"),
});

export type CliConfig = z.infer<typeof cliConfigSchema>;

export const DEFAULT_CLI_CONFIG: CliConfig = cliConfigSchema.parse({});

export class ConfigValidationError extends Error {
  readonly issues: string[];
  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

export interface ConfigStoreOptions {
  baseDir?: string;
  fileName?: string;
}

export class ConfigStore {
  private readonly filePath: string;

  constructor(options: ConfigStoreOptions = {}) {
    const fileName = options.fileName ?? CONFIG_FILE_NAME;
    this.filePath = options.baseDir ? path.join(options.baseDir, fileName) : fileName;
  }

  get path(): string {
    return this.resolvePath();
  }

  /** Validated configuration; a missing or invalid file yields the defaults. */
  async load(): Promise<CliConfig> {
    const raw = await this.loadRaw();
    try {
      return parseCliConfig(raw);
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        getLogger().warn("config", "Ignoring invalid configuration file", {
          path: this.resolvePath(),
          issues: error.issues,
        });
        return { ...DEFAULT_CLI_CONFIG };
      }
      throw error;
    }
  }

  /** File contents as stored, without defaults applied. */
  async loadRaw(): Promise<Record<string, unknown>> {
    let data: string;
    try {
      data = await readFile(this.resolvePath(), "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw error;
    }
    try {
      const parsed = JSON.parse(data) as unknown;
      return isRecord(parsed) ? parsed : {};
    } catch (error) {
      getLogger().warn("config", "Configuration file is not valid JSON", {
        path: this.resolvePath(),
        message: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
  }

  async save(config: Record<string, unknown>): Promise<void> {
    if (!this.isExplicitPath()) {
      await ensureCliStateDir();
    }
    await writeFile(this.resolvePath(), JSON.stringify(config, null, 2), "utf8");
  }

  private isExplicitPath(): boolean {
    return path.isAbsolute(this.filePath);
  }

  private resolvePath(): string {
    if (this.isExplicitPath()) {
      return this.filePath;
    }
    return resolveCliPath(this.filePath);
  }
}

export function parseCliConfig(raw: unknown): CliConfig {
  const result = cliConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    );
  }
  return result.data;
}

export function themeFromConfig(config: CliConfig): WidgetTheme {
  return { header: { fg: config.headerFg, bg: config.headerBg } };
}

export function parseConfigValue(raw: string): unknown {
  if (raw === "true") {
    return true;
  }
  if (raw === "false") {
    return false;
  }
  const numberValue = Number(raw);
  if (!Number.isNaN(numberValue) && raw.trim() !== "") {
    return numberValue;
  }
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return raw;
  }
}

export function setConfigValue(target: Record<string, unknown>, key: string, value: unknown): void {
  const parts = key.split(".").filter(Boolean);
  if (parts.length === 0) {
    return;
  }
  let cursor: Record<string, unknown> = target;
  for (let i = 0; i < parts.length - 1; i += 1) {
    const part = parts[i];
    const next = cursor[part];
    if (isRecord(next)) {
      cursor = next;
    } else {
      const created: Record<string, unknown> = {};
      cursor[part] = created;
      cursor = created;
    }
  }
  cursor[parts[parts.length - 1]] = value;
}

export function unsetConfigValue(target: Record<string, unknown>, key: string): boolean {
  const parts = key.split(".").filter(Boolean);
  if (parts.length === 0) {
    return false;
  }
  let cursor: Record<string, unknown> = target;
  for (let i = 0; i < parts.length - 1; i += 1) {
    const next = cursor[parts[i]];
    if (!isRecord(next)) {
      return false;
    }
    cursor = next;
  }
  const finalKey = parts[parts.length - 1];
  if (!(finalKey in cursor)) {
    return false;
  }
  delete cursor[finalKey];
  return true;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
