/**
 * Key model shared by every widget.
 *
 * Keys are plain tagged values so they can be compared, logged and replayed.
 * `parseKeySequence` decodes raw terminal input; `parseKeySpec` and
 * `formatKey` convert to and from the emacs-style labels used on the command
 * line (`C-t`, `M-x`, `Tab`, `PageDown`, `F5`).
 */

import { KeySpecError } from "../errors";

export const NAMED_KEYS = [
  "Up",
  "Down",
  "Left",
  "Right",
  "Home",
  "End",
  "PageUp",
  "PageDown",
  "Backspace",
  "Delete",
  "Insert",
  "Esc",
  "BackTab",
] as const;

export type NamedKey = (typeof NAMED_KEYS)[number];

export type Key =
  | { kind: "char"; char: string }
  | { kind: "ctrl"; char: string }
  | { kind: "alt"; char: string }
  | { kind: "named"; name: NamedKey }
  | { kind: "fn"; number: number };

export function char(value: string): Key {
  return { kind: "char", char: value };
}

export function ctrl(value: string): Key {
  return { kind: "ctrl", char: value };
}

export function alt(value: string): Key {
  return { kind: "alt", char: value };
}

export function named(name: NamedKey): Key {
  return { kind: "named", name };
}

export function fn(number: number): Key {
  return { kind: "fn", number };
}

export function keysEqual(a: Key, b: Key): boolean {
  switch (a.kind) {
    case "char":
    case "ctrl":
    case "alt":
      return b.kind === a.kind && b.char === a.char;
    case "named":
      return b.kind === "named" && b.name === a.name;
    case "fn":
      return b.kind === "fn" && b.number === a.number;
  }
}

const CHAR_LABELS: Record<string, string> = {
  "\t": "Tab",
  "\n": "Enter",
  " ": "Space",
};

const LABEL_CHARS: Record<string, string> = {
  tab: "\t",
  enter: "\n",
  return: "\n",
  space: " ",
};

export function formatKey(key: Key): string {
  switch (key.kind) {
    case "char":
      return CHAR_LABELS[key.char] ?? key.char;
    case "ctrl":
      return `C-${key.char}`;
    case "alt":
      return `M-${key.char}`;
    case "named":
      return key.name;
    case "fn":
      return `F${key.number}`;
  }
}

export function parseKeySpec(spec: string): Key {
  const trimmed = spec.trim();
  if (Array.from(trimmed).length === 1) {
    return char(trimmed);
  }

  const lower = trimmed.toLowerCase();
  const mapped = LABEL_CHARS[lower];
  if (mapped !== undefined) {
    return char(mapped);
  }

  const modifier = /^([CM])-(.)$/u.exec(trimmed);
  if (modifier) {
    const [, prefix, value] = modifier;
    return prefix === "C" ? ctrl(value.toLowerCase()) : alt(value);
  }

  const namedKey = NAMED_KEYS.find((name) => name.toLowerCase() === lower);
  if (namedKey) {
    return named(namedKey);
  }

  const fnKey = /^f(\d{1,2})$/.exec(lower);
  if (fnKey) {
    const number = Number.parseInt(fnKey[1], 10);
    if (number >= 1 && number <= 12) {
      return fn(number);
    }
  }

  throw new KeySpecError(spec);
}

/** Parse a whitespace-separated list of key labels. */
export function parseKeySpecs(specs: string): Key[] {
  return specs
    .split(/\s+/)
    .filter(Boolean)
    .map((spec) => parseKeySpec(spec));
}

const CSI_LETTER_KEYS: Record<string, Key> = {
  A: named("Up"),
  B: named("Down"),
  C: named("Right"),
  D: named("Left"),
  H: named("Home"),
  F: named("End"),
  Z: named("BackTab"),
};

const SS3_KEYS: Record<string, Key> = {
  ...CSI_LETTER_KEYS,
  P: fn(1),
  Q: fn(2),
  R: fn(3),
  S: fn(4),
};

const CSI_TILDE_KEYS: Record<string, Key> = {
  "1": named("Home"),
  "2": named("Insert"),
  "3": named("Delete"),
  "4": named("End"),
  "5": named("PageUp"),
  "6": named("PageDown"),
  "7": named("Home"),
  "8": named("End"),
  "15": fn(5),
  "17": fn(6),
  "18": fn(7),
  "19": fn(8),
  "20": fn(9),
  "21": fn(10),
  "23": fn(11),
  "24": fn(12),
};

/**
 * Decode raw terminal input into keys. Unknown escape sequences are dropped.
 */
export function parseKeySequence(input: string): Key[] {
  const chars = Array.from(input);
  const keys: Key[] = [];
  let i = 0;

  while (i < chars.length) {
    const current = chars[i];

    if (current === "\u001b") {
      const consumed = decodeEscape(chars, i, keys);
      i += consumed;
      continue;
    }

    keys.push(decodeSingle(current));
    i += 1;
  }

  return keys;
}

function decodeSingle(value: string): Key {
  if (value === "\r" || value === "\n") {
    return char("\n");
  }
  if (value === "\t") {
    return char("\t");
  }
  if (value === "\u007f" || value === "\b") {
    return named("Backspace");
  }
  const code = value.codePointAt(0) ?? 0;
  if (code === 0) {
    return ctrl(" ");
  }
  if (code >= 1 && code <= 26) {
    return ctrl(String.fromCharCode(code + 96));
  }
  return char(value);
}

/** Returns the number of code points consumed starting at `start`. */
function decodeEscape(chars: string[], start: number, keys: Key[]): number {
  const next = chars[start + 1];
  if (next === undefined) {
    keys.push(named("Esc"));
    return 1;
  }

  if (next === "O" && start + 2 < chars.length) {
    const key = SS3_KEYS[chars[start + 2]];
    if (key) {
      keys.push(key);
    }
    return 3;
  }

  if (next === "[" && start + 2 < chars.length) {
    let end = start + 2;
    while (end < chars.length && !isFinalByte(chars[end])) {
      end += 1;
    }
    if (end >= chars.length) {
      return chars.length - start;
    }
    const params = chars.slice(start + 2, end).join("");
    const final = chars[end];
    const key = final === "~" ? CSI_TILDE_KEYS[params] : CSI_LETTER_KEYS[final];
    if (key) {
      keys.push(key);
    }
    return end - start + 1;
  }

  keys.push(alt(next));
  return 2;
}

function isFinalByte(value: string): boolean {
  const code = value.codePointAt(0) ?? 0;
  return code >= 0x40 && code <= 0x7e;
}
