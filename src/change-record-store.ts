import { ChangePhase, type ChangePhaseValue, type ChangeRecord } from "./types.js";

/**
 * Path-keyed store of change records.
 *
 * A record is created the first time its path is seen in either phase.
 * Writing a phase replaces that phase's counts; repeated reports for the
 * same path within one phase are not summed.
 */
export class ChangeRecordStore {
  private readonly records = new Map<string, ChangeRecord>();

  upsert(path: string, phase: ChangePhaseValue, added: number, deleted: number): void {
    let record = this.records.get(path);
    if (!record) {
      record = {
        path,
        worktree: { added: 0, deleted: 0 },
        index: { added: 0, deleted: 0 },
      };
      this.records.set(path, record);
    }

    if (phase === ChangePhase.WORKTREE) {
      record.worktree = { added, deleted };
    } else {
      record.index = { added, deleted };
    }
  }

  size(): number {
    return this.records.size;
  }

  /**
   * Copy of the record for a path, if any phase reported it.
   */
  get(path: string): ChangeRecord | undefined {
    const record = this.records.get(path);
    return record ? copyRecord(record) : undefined;
  }

  /**
   * Copies of all records, in no particular order.
   */
  snapshot(): ChangeRecord[] {
    return [...this.records.values()].map(copyRecord);
  }
}

function copyRecord(record: ChangeRecord): ChangeRecord {
  return {
    path: record.path,
    worktree: { ...record.worktree },
    index: { ...record.index },
  };
}
