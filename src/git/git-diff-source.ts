import type { DiffSource } from "../interfaces/diff-source.js";
import type { ChangeEvent } from "../types.js";
import type { GitRunner } from "./git-runner.js";
import { parseNumstat } from "./numstat-parser.js";

const NUMSTAT_ARGS = ["--numstat", "-z", "--no-renames", "--no-ext-diff", "--no-color"];

/**
 * DiffSource using git's plumbing diff commands.
 */
export class GitDiffSource implements DiffSource {
  constructor(private readonly git: GitRunner) {}

  async *compareWorktreeToIndex(): AsyncIterable<ChangeEvent> {
    const output = await this.git.runBuffer(["diff-files", ...NUMSTAT_ARGS]);
    yield* parseNumstat(output);
  }

  async *compareIndexToTree(treeish: string): AsyncIterable<ChangeEvent> {
    const output = await this.git.runBuffer(["diff-index", "--cached", ...NUMSTAT_ARGS, treeish, "--"]);
    yield* parseNumstat(output);
  }
}
