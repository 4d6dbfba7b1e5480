/**
 * Safe path handling. No hardcoded separators: everything goes through
 * path.join() and os.homedir().
 */

import { homedir } from "node:os";
import { join, resolve } from "node:path";

const STRATA_HOME = join(homedir(), ".strata");

export function getStrataHome(): string {
  return process.env["STRATA_HOME"] ?? STRATA_HOME;
}

export function getConfigPath(): string {
  return join(getStrataHome(), "config.json");
}

export function getLogDir(): string {
  return join(getStrataHome(), "logs");
}

/** Resolve a configured path, expanding a leading "~" to the home directory. */
export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/") || path.startsWith("~\\")) {
    return join(homedir(), path.slice(2));
  }
  return resolve(path);
}
