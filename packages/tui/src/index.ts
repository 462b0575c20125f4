export * from "./errors";
export * from "./input/keys";
export * from "./observability";
export * from "./result";
export * from "./tabs/tabbable";
export * from "./tabs/tabStrip";
export * from "./tabs/tabView";
export * from "./term/escapes";
export * from "./widget/core";
export * from "./widget/types";
