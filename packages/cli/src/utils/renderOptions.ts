import { InvalidArgumentError } from "commander";

export type RenderFormat = "text" | "json";

export const WIDTH_ENV = "TERMTABS_WIDTH";
export const HEIGHT_ENV = "TERMTABS_HEIGHT";

/** Header row, footer row and at least one body row. */
export const MIN_HEIGHT = 3;

export function resolveFormat(value: string | undefined): RenderFormat {
  return value?.trim().toLowerCase() === "json" ? "json" : "text";
}

/** Flag value first, then the environment variable, then the configured value. */
export function resolveDimension(
  primary: number | undefined,
  envVar: string,
  fallback: number,
  minimum = 1
): number {
  if (primary !== undefined) {
    return primary;
  }
  const envValue = process.env[envVar];
  if (envValue) {
    const parsed = Number.parseInt(envValue.trim(), 10);
    if (Number.isInteger(parsed) && parsed >= minimum) {
      return parsed;
    }
  }
  return fallback;
}

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function parseHeight(value: string): number {
  const parsed = parsePositiveInteger(value);
  if (parsed < MIN_HEIGHT) {
    throw new InvalidArgumentError(`Expected a height of at least ${MIN_HEIGHT}.`);
  }
  return parsed;
}
