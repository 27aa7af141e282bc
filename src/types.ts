/**
 * Comparison passes, in the order they run.
 */
export const ChangePhase = {
  /** Working copy compared against the index */
  WORKTREE: "worktree",
  /** Index compared against the reference commit (or the empty tree) */
  INDEX: "index",
} as const;

export type ChangePhaseValue = (typeof ChangePhase)[keyof typeof ChangePhase];

/**
 * Line counts for one path in one phase.
 */
export interface LineDelta {
  added: number;
  deleted: number;
}

/**
 * Aggregated changes for a single path across both phases.
 */
export interface ChangeRecord {
  /** Path relative to the repository root */
  path: string;

  /** Working copy vs index */
  worktree: LineDelta;

  /** Index vs reference */
  index: LineDelta;
}

/**
 * One changed path as reported by a diff engine.
 */
export interface ChangeEvent {
  path: string;
  added: number;
  deleted: number;
}

export function isEmptyDelta(delta: LineDelta): boolean {
  return delta.added === 0 && delta.deleted === 0;
}
