/**
 * Terminal escape sequences used by widgets when building draw strings.
 * Everything here is pure string construction; nothing is written to a TTY.
 */

const ESC = "\u001b";
const CSI = `${ESC}[`;

// CSI parameter bytes, intermediate bytes, then a single final byte.
// biome-ignore lint/suspicious/noControlCharactersInRegex: matching escape sequences
const CSI_PATTERN = /\u001b\[[0-?]*[ -/]*[@-~]/g;

export const ANSI_COLORS = [
  "black",
  "red",
  "green",
  "yellow",
  "blue",
  "magenta",
  "cyan",
  "white",
  "default",
] as const;

export type AnsiColor = (typeof ANSI_COLORS)[number];

const FG_CODES: Record<AnsiColor, number> = {
  black: 30,
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  magenta: 35,
  cyan: 36,
  white: 37,
  default: 39,
};

export type HeaderStyle = {
  fg: AnsiColor;
  bg: AnsiColor;
};

export function invert(): string {
  return `${CSI}7m`;
}

export function reset(): string {
  return `${CSI}0m`;
}

export function fg(color: AnsiColor): string {
  return `${CSI}${FG_CODES[color]}m`;
}

export function bg(color: AnsiColor): string {
  return `${CSI}${FG_CODES[color] + 10}m`;
}

export function headerColor(style: HeaderStyle): string {
  return `${fg(style.fg)}${bg(style.bg)}`;
}

/** Move the cursor to a 1-based (column, row) cell. */
export function gotoXY(x: number, y: number): string {
  return `${CSI}${Math.max(1, Math.trunc(y))};${Math.max(1, Math.trunc(x))}H`;
}

/** Erase from the cursor to the end of the line. */
export function clearLine(): string {
  return `${CSI}K`;
}

export function stripEscapes(text: string): string {
  return text.replace(CSI_PATTERN, "");
}

/** Number of code points left once escape sequences are removed. */
export function visibleLength(text: string): number {
  return Array.from(stripEscapes(text)).length;
}

/**
 * Clip plain text to `width` code points. Text containing escape sequences
 * should be clipped before styling is applied.
 */
export function truncateVisible(text: string, width: number): string {
  if (width <= 0) {
    return "";
  }
  const chars = Array.from(text);
  return chars.length <= width ? text : chars.slice(0, width).join("");
}
