/**
 * Reporter - Renders a ChangeRecordStore as a fixed-column table.
 *
 * ```
 *            staged     unstaged path
 *   1:    unchanged        +3/-1 a.txt
 *   2:        +0/-2      nothing b.txt
 *
 * ```
 *
 * Cells are right-aligned to 12 columns. A wider cell is never truncated;
 * it pushes the rest of its row to the right. Path bytes that are not UTF-8
 * print as octal escapes.
 */

import type { ChangeRecordStore } from "./change-record-store.js";
import { colorize } from "./color/color-value.js";
import { type ColorPalette, NO_COLOR_PALETTE } from "./color/color-config.js";
import { comparePaths, displayPath } from "./paths.js";
import { type ChangeRecord, isEmptyDelta, type LineDelta } from "./types.js";

const HEADER_INDENT = "      ";
const COLUMN_WIDTH = 12;

/**
 * Display strings used by the report.
 */
export interface ReportLabels {
  /** Header of the index vs reference column */
  staged: string;
  /** Header of the working copy vs index column */
  unstaged: string;
  /** Header of the path column */
  path: string;
  /** Working cell when the working copy matches the index */
  nothing: string;
  /** Staged cell when the index matches the reference */
  unchanged: string;
}

export const DEFAULT_LABELS: ReportLabels = {
  staged: "staged",
  unstaged: "unstaged",
  path: "path",
  nothing: "nothing",
  unchanged: "unchanged",
};

export interface ReporterOptions {
  /** Only the header slot is used (default: no colors) */
  palette?: ColorPalette;
  labels?: Partial<ReportLabels>;
}

/**
 * Anything the report can be written to, e.g. process.stdout.
 */
export interface ReportOutput {
  write(chunk: string): unknown;
}

export function formatDelta(delta: LineDelta, unchangedLabel: string): string {
  return isEmptyDelta(delta) ? unchangedLabel : `+${delta.added}/-${delta.deleted}`;
}

function formatColumns(staged: string, unstaged: string, path: string): string {
  return `${staged.padStart(COLUMN_WIDTH)} ${unstaged.padStart(COLUMN_WIDTH)} ${path}`;
}

export class Reporter {
  private readonly palette: ColorPalette;
  private readonly labels: ReportLabels;

  constructor(options: ReporterOptions = {}) {
    this.palette = options.palette ?? NO_COLOR_PALETTE;
    this.labels = { ...DEFAULT_LABELS, ...options.labels };
  }

  /**
   * Records sorted by path.
   */
  sortedRecords(store: ChangeRecordStore): ChangeRecord[] {
    return store.snapshot().sort((a, b) => comparePaths(a.path, b.path));
  }

  render(store: ChangeRecordStore): string {
    if (store.size() === 0) {
      return "\n";
    }

    const { labels } = this;
    const lines: string[] = [];

    lines.push(
      HEADER_INDENT +
        colorize(formatColumns(labels.staged, labels.unstaged, labels.path), this.palette.header),
    );

    this.sortedRecords(store).forEach((record, i) => {
      const staged = formatDelta(record.index, labels.unchanged);
      const unstaged = formatDelta(record.worktree, labels.nothing);
      lines.push(` ${String(i + 1).padStart(2)}: ${formatColumns(staged, unstaged, displayPath(record.path))}`);
    });

    return `${lines.join("\n")}\n\n`;
  }

  print(store: ChangeRecordStore, out: ReportOutput): void {
    out.write(this.render(store));
  }
}
