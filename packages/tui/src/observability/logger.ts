import type { LogCategory, LogContext, LogEntry, LogLevel } from "./types";

export type LoggerConfig = {
  minLevel: LogLevel;
  console: boolean;
  handler?: (entry: LogEntry) => void;
  defaultContext?: Partial<LogContext>;
  now?: () => string;
};

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function formatLogValue(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value instanceof Error) {
    return value.stack ?? value.message;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function formatLogLine(values: unknown[]): string {
  return values.map(formatLogValue).join(" ");
}

function writeLine(output: string, stream: "stdout" | "stderr"): void {
  const target = stream === "stderr" ? process.stderr : process.stdout;
  target.write(`${output}\n`);
}

export class TabLogger {
  private readonly config: LoggerConfig;
  private context: Partial<LogContext>;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      minLevel: config.minLevel ?? "info",
      console: config.console ?? true,
      handler: config.handler,
      defaultContext: config.defaultContext ?? {},
      now: config.now,
    };
    this.context = { ...this.config.defaultContext };
  }

  child(ctx: Partial<LogContext>): TabLogger {
    const c = new TabLogger(this.config);
    c.context = { ...this.context, ...ctx };
    return c;
  }

  debug(cat: LogCategory, msg: string, data?: Record<string, unknown>): void {
    this.log("debug", cat, msg, data);
  }

  info(cat: LogCategory, msg: string, data?: Record<string, unknown>): void {
    this.log("info", cat, msg, data);
  }

  warn(cat: LogCategory, msg: string, data?: Record<string, unknown>): void {
    this.log("warn", cat, msg, data);
  }

  error(cat: LogCategory, msg: string, err?: Error, data?: Record<string, unknown>): void {
    this.log("error", cat, msg, data, err);
  }

  private log(
    lvl: LogLevel,
    cat: LogCategory,
    msg: string,
    data?: Record<string, unknown>,
    err?: Error
  ): void {
    if (LOG_LEVEL_PRIORITY[lvl] < LOG_LEVEL_PRIORITY[this.config.minLevel]) {
      return;
    }
    const entry: LogEntry = {
      timestamp: this.config.now ? this.config.now() : new Date().toISOString(),
      level: lvl,
      category: cat,
      message: msg,
      context: this.context,
      data,
      error: err ? { name: err.name, message: err.message, stack: err.stack } : undefined,
    };
    if (this.config.handler) {
      this.config.handler(entry);
    }
    if (this.config.console) {
      this.consoleLog(entry);
    }
  }

  private consoleLog(e: LogEntry): void {
    const p = `[${e.timestamp}] [${e.level.toUpperCase()}] [${e.category}]`;
    const c = e.context.viewId ? ` (view:${e.context.viewId})` : "";
    const a: unknown[] = [`${p + c} ${e.message}`];
    if (e.data) {
      a.push(e.data);
    }
    if (e.error) {
      a.push(e.error);
    }
    const line = formatLogLine(a);
    const stream = e.level === "warn" || e.level === "error" ? "stderr" : "stdout";
    writeLine(line, stream);
  }
}

let defaultLogger: TabLogger | null = null;

export function getLogger(): TabLogger {
  if (!defaultLogger) {
    defaultLogger = new TabLogger();
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: TabLogger): void {
  defaultLogger = logger;
}
