/**
 * ChangeCollector - Runs both comparison passes into one ChangeRecordStore.
 *
 * Phase order is fixed:
 * 1. working copy vs index
 * 2. index vs HEAD (or the empty tree when HEAD does not resolve)
 *
 * Every event is written with the phase of the pass that produced it.
 */

import type { ChangeRecordStore } from "./change-record-store.js";
import type { DiffSource } from "./interfaces/diff-source.js";
import type { IndexLoader } from "./interfaces/index-loader.js";
import type { ReferenceResolver } from "./interfaces/reference-resolver.js";
import { type Logger, silentLogger } from "./logger.js";
import { type ChangeEvent, ChangePhase, type ChangePhaseValue } from "./types.js";

/**
 * Options for creating a ChangeCollector.
 */
export interface ChangeCollectorOptions {
  /** Line-count diff engine */
  diff: DiffSource;

  /** Resolves the reference commit */
  references: ReferenceResolver;

  /** Reads the index before the passes run */
  index: IndexLoader;

  /** Revision compared against the index (default: "HEAD") */
  reference?: string;

  logger?: Logger;
}

export class ChangeCollector {
  private readonly diff: DiffSource;
  private readonly references: ReferenceResolver;
  private readonly index: IndexLoader;
  private readonly reference: string;
  private readonly logger: Logger;

  constructor(options: ChangeCollectorOptions) {
    this.diff = options.diff;
    this.references = options.references;
    this.index = options.index;
    this.reference = options.reference ?? "HEAD";
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Collect both phases into the store.
   *
   * @returns false when the index could not be loaded; nothing was
   *   collected and no report should be shown
   */
  async run(store: ChangeRecordStore): Promise<boolean> {
    if (!(await this.index.load())) {
      this.logger.debug("index could not be read, skipping collection");
      return false;
    }

    await this.collect(store, ChangePhase.WORKTREE, this.diff.compareWorktreeToIndex());

    const baseline = await this.resolveBaseline();
    await this.collect(store, ChangePhase.INDEX, this.diff.compareIndexToTree(baseline));

    return true;
  }

  /**
   * The reference commit, or the empty tree when it does not resolve.
   */
  async resolveBaseline(): Promise<string> {
    const resolved = await this.references.resolve(this.reference);
    if (resolved === undefined) {
      this.logger.debug(`${this.reference} does not resolve, comparing against the empty tree`);
      return this.references.emptyTree();
    }
    return resolved;
  }

  private async collect(
    store: ChangeRecordStore,
    phase: ChangePhaseValue,
    events: AsyncIterable<ChangeEvent>,
  ): Promise<void> {
    let count = 0;
    for await (const event of events) {
      store.upsert(event.path, phase, event.added, event.deleted);
      count++;
    }
    this.logger.debug(`${phase}: ${count} changed path(s)`);
  }
}

export function createChangeCollector(options: ChangeCollectorOptions): ChangeCollector {
  return new ChangeCollector(options);
}
