import { char, ctrl, type Key, keysEqual } from "../input/keys";
import type { Widget } from "../widget/types";

/**
 * Tab-level behaviour a host supplies on top of a container.
 */
export interface Tabbable {
  /** Create and attach a new tab. */
  newTab(): void;
  /** Remove the current tab. */
  closeTab(): void;
  /** Advance to the next tab, wrapping after the last. */
  nextTab(): void;
  /** Runs after a switch completes. Failures are logged, not thrown. */
  onNextTab?(): void;
  /** One label per tab, in tab order. Each call starts a fresh iteration. */
  getTabNames(): Iterable<string | undefined>;
  activeTab(): Widget;
  /** Receives every key that is not a reserved chord. */
  onKeySub(key: Key): void;
}

export type TabAction = "newTab" | "closeTab" | "nextTab";

export type DispatchOutcome = TabAction | "forwarded";

export type ReservedChord = {
  readonly key: Key;
  readonly action: TabAction;
};

export const RESERVED_CHORDS: readonly ReservedChord[] = [
  { key: ctrl("t"), action: "newTab" },
  { key: ctrl("w"), action: "closeTab" },
  { key: char("\t"), action: "nextTab" },
];

export function findReservedAction(
  key: Key,
  chords: readonly ReservedChord[] = RESERVED_CHORDS
): TabAction | undefined {
  return chords.find((chord) => keysEqual(chord.key, key))?.action;
}

/**
 * Route a key: reserved chords first, then the host's own handler.
 */
export function dispatchTabKey(
  target: Tabbable,
  key: Key,
  chords: readonly ReservedChord[] = RESERVED_CHORDS
): DispatchOutcome {
  const action = findReservedAction(key, chords);
  switch (action) {
    case "newTab":
      target.newTab();
      return action;
    case "closeTab":
      target.closeTab();
      return action;
    case "nextTab":
      target.nextTab();
      return action;
    case undefined:
      target.onKeySub(key);
      return "forwarded";
  }
}
