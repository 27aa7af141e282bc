/**
 * The --status flow: collect both phases, then print.
 */

import { ChangeCollector } from "../change-collector.js";
import { ChangeRecordStore } from "../change-record-store.js";
import {
  type ColorPalette,
  parseColorConfig,
  resolvePalette,
  type TerminalInfo,
} from "../color/color-config.js";
import { readColorConfigEntries } from "../git/git-config-reader.js";
import { GitDiffSource } from "../git/git-diff-source.js";
import { GitIndexLoader } from "../git/git-index-loader.js";
import { GitReferenceResolver } from "../git/git-reference-resolver.js";
import type { GitRunner } from "../git/git-runner.js";
import type { Logger } from "../logger.js";
import { Reporter, type ReportOutput } from "../reporter.js";

export interface StatusContext {
  git: GitRunner;
  palette: ColorPalette;
  logger: Logger;
  out: ReportOutput;
}

/**
 * Read the color settings and build the palette for this terminal.
 *
 * @throws ConfigError on a malformed color setting
 */
export async function loadPalette(git: GitRunner, terminal: TerminalInfo): Promise<ColorPalette> {
  const config = parseColorConfig(await readColorConfigEntries(git));
  return resolvePalette(config, terminal);
}

/**
 * Print the status report.
 *
 * Prints nothing at all when the index cannot be read.
 *
 * @returns whether a report was printed
 * @throws GitExecError when the directory is not inside a repository
 */
export async function runStatus(ctx: StatusContext): Promise<boolean> {
  const { git, palette, logger, out } = ctx;

  // Fails outside a repository
  await git.run(["rev-parse", "--git-dir"]);

  const store = new ChangeRecordStore();
  const collector = new ChangeCollector({
    diff: new GitDiffSource(git),
    references: new GitReferenceResolver(git),
    index: new GitIndexLoader(git, logger),
    logger,
  });

  if (!(await collector.run(store))) {
    return false;
  }

  new Reporter({ palette }).print(store, out);
  return true;
}
