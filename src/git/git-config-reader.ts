import type { ConfigEntry } from "../color/color-config.js";
import { GitExecError } from "../errors/git-exec-error.js";
import type { GitRunner } from "./git-runner.js";

/**
 * Parse `git config -z` listing output.
 *
 * Entries are NUL-terminated; key and value are separated by a newline, and
 * a key given without "=" has no newline at all.
 */
export function parseConfigListing(output: string): ConfigEntry[] {
  const entries: ConfigEntry[] = [];
  for (const item of output.split("\0")) {
    if (!item) continue;
    const newline = item.indexOf("\n");
    if (newline < 0) {
      entries.push({ key: item, value: null });
    } else {
      entries.push({ key: item.slice(0, newline), value: item.slice(newline + 1) });
    }
  }
  return entries;
}

/**
 * Read every setting whose key matches a pattern, in configuration order.
 */
export async function readConfigEntries(git: GitRunner, pattern: string): Promise<ConfigEntry[]> {
  try {
    return parseConfigListing(await git.run(["config", "-z", "--get-regexp", pattern]));
  } catch (err) {
    // Exit code 1: no key matched
    if (err instanceof GitExecError && err.exitCode === 1) {
      return [];
    }
    throw err;
  }
}

export function readColorConfigEntries(git: GitRunner): Promise<ConfigEntry[]> {
  return readConfigEntries(git, "^color\\.");
}
