/**
 * Diff engine consumed by the collector.
 *
 * Each comparison yields one event per changed path, in the engine's order.
 * The collector never computes line counts itself.
 */

import type { ChangeEvent } from "../types.js";

export interface DiffSource {
  /**
   * Working copy compared against the index.
   */
  compareWorktreeToIndex(): AsyncIterable<ChangeEvent>;

  /**
   * Index compared against a tree-ish (a commit id or a tree id).
   *
   * @param treeish Baseline to compare the index against
   */
  compareIndexToTree(treeish: string): AsyncIterable<ChangeEvent>;
}
