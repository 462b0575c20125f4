/**
 * Observability Types
 */

/** Correlation context attached to every entry written by a logger */
export type LogContext = {
  /** Identifier of the tab view that produced the entry */
  viewId: string;
  /** Active tab index at the time of the entry */
  tabIndex: number;
  /** Label of the key being dispatched */
  key: string;
};

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogCategory = "tabs" | "input" | "render" | "config" | "cli";

/** Structured log entry */
export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  context: Partial<LogContext>;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
};
