export * from "./logger";
export * from "./types";
