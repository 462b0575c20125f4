/**
 * Tab View Error Types
 */

export type TabViewErrorCode =
  | "EMPTY"
  | "LAST_TAB"
  | "INDEX_OUT_OF_RANGE"
  | "NAME_MISMATCH"
  | "TAB_LIMIT"
  | "KEY_SPEC";

export class TabViewError extends Error {
  readonly code: TabViewErrorCode;

  constructor(message: string, code: TabViewErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = "TabViewError";
    this.code = code;
  }
}

export class EmptyTabViewError extends TabViewError {
  constructor(operation: string) {
    super(`Cannot ${operation}: the tab view has no tabs`, "EMPTY");
    this.name = "EmptyTabViewError";
  }
}

export class LastTabError extends TabViewError {
  constructor() {
    super("Cannot close the last remaining tab", "LAST_TAB");
    this.name = "LastTabError";
  }
}

export class TabIndexError extends TabViewError {
  readonly index: number;
  readonly length: number;
  constructor(index: number, length: number) {
    super(`Tab index ${index} is out of range for ${length} tab(s)`, "INDEX_OUT_OF_RANGE");
    this.name = "TabIndexError";
    this.index = index;
    this.length = length;
  }
}

export class TabNameMismatchError extends TabViewError {
  constructor(names: number, tabs: number) {
    super(`Got ${names} tab name(s) for ${tabs} tab(s)`, "NAME_MISMATCH");
    this.name = "TabNameMismatchError";
  }
}

export class TabLimitError extends TabViewError {
  readonly maxTabs: number;
  constructor(maxTabs: number) {
    super(`Tab limit of ${maxTabs} reached`, "TAB_LIMIT");
    this.name = "TabLimitError";
    this.maxTabs = maxTabs;
  }
}

export class KeySpecError extends TabViewError {
  readonly spec: string;
  constructor(spec: string) {
    super(`Unrecognized key: ${JSON.stringify(spec)}`, "KEY_SPEC");
    this.name = "KeySpecError";
    this.spec = spec;
  }
}
