import { mkdir } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export const STATE_DIR_ENV = "TERMTABS_STATE_DIR";

/**
 * `TERMTABS_STATE_DIR`, then `$XDG_CONFIG_HOME/termtabs`, then `~/.termtabs`.
 */
export function resolveCliStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[STATE_DIR_ENV];
  if (override) {
    return path.resolve(override);
  }
  const xdgConfig = env.XDG_CONFIG_HOME;
  if (xdgConfig && path.isAbsolute(xdgConfig)) {
    return path.join(xdgConfig, "termtabs");
  }
  return path.join(os.homedir(), ".termtabs");
}

export async function ensureCliStateDir(): Promise<string> {
  const dir = resolveCliStateDir();
  await mkdir(dir, { recursive: true });
  return dir;
}

export function resolveCliPath(fileName: string): string {
  return path.join(resolveCliStateDir(), fileName);
}
