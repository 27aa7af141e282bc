/**
 * Tests for Reporter
 */

import { describe, expect, it } from "vitest";

import { ChangeRecordStore } from "../src/change-record-store.js";
import { DEFAULT_PALETTE } from "../src/color/color-config.js";
import { comparePaths, decodePath } from "../src/paths.js";
import { formatDelta, Reporter } from "../src/reporter.js";
import { ChangePhase } from "../src/types.js";

const HEADER = "            staged     unstaged path";

function rowsOf(output: string): string[] {
  return output.split("\n").filter((line) => /^ +\d+: /.test(line));
}

describe("Reporter", () => {
  describe("empty store", () => {
    it("should render a single blank line", () => {
      const reporter = new Reporter();

      expect(reporter.render(new ChangeRecordStore())).toBe("\n");
    });

    it("should not emit the header even with colors", () => {
      const reporter = new Reporter({ palette: DEFAULT_PALETTE });

      expect(reporter.render(new ChangeRecordStore())).toBe("\n");
    });
  });

  it("should render the working-only and staged-only scenario", () => {
    const store = new ChangeRecordStore();
    store.upsert("a.txt", ChangePhase.WORKTREE, 3, 1);
    store.upsert("b.txt", ChangePhase.INDEX, 0, 2);

    const output = new Reporter().render(store);

    expect(output).toBe(
      `${HEADER}\n` +
        "  1:    unchanged        +3/-1 a.txt\n" +
        "  2:        +0/-2      nothing b.txt\n" +
        "\n",
    );
  });

  it("should show both deltas for a path changed in both phases", () => {
    const store = new ChangeRecordStore();
    store.upsert("src/main.ts", ChangePhase.WORKTREE, 4, 0);
    store.upsert("src/main.ts", ChangePhase.INDEX, 12, 7);

    expect(rowsOf(new Reporter().render(store))).toEqual(["  1:       +12/-7        +4/-0 src/main.ts"]);
  });

  it("should escape path bytes that are not UTF-8", () => {
    const store = new ChangeRecordStore();
    store.upsert(decodePath(Buffer.of(0xff, 0x2e, 0x74)), ChangePhase.WORKTREE, 1, 0);
    store.upsert(decodePath(Buffer.of(0xfe, 0x2e, 0x74)), ChangePhase.WORKTREE, 2, 0);

    expect(store.size()).toBe(2);
    expect(rowsOf(new Reporter().render(store))).toEqual([
      "  1:    unchanged        +2/-0 \\376.t",
      "  2:    unchanged        +1/-0 \\377.t",
    ]);
  });

  it("should list a path with zero counts in both phases as unchanged and nothing", () => {
    const store = new ChangeRecordStore();
    store.upsert("image.png", ChangePhase.INDEX, 0, 0);

    expect(rowsOf(new Reporter().render(store))).toEqual(["  1:    unchanged      nothing image.png"]);
  });

  it("should sort rows by path regardless of insertion order", () => {
    const store = new ChangeRecordStore();
    store.upsert("c.txt", ChangePhase.WORKTREE, 1, 0);
    store.upsert("a.txt", ChangePhase.INDEX, 1, 0);
    store.upsert("B.txt", ChangePhase.WORKTREE, 1, 0);

    const paths = rowsOf(new Reporter().render(store)).map((row) => row.split(" ").pop());

    expect(paths).toEqual(["B.txt", "a.txt", "c.txt"]);
  });

  it("should order paths by UTF-8 bytes, not UTF-16 code units", () => {
    const store = new ChangeRecordStore();
    store.upsert("\u{1F600}.txt", ChangePhase.WORKTREE, 1, 0);
    store.upsert("�.txt", ChangePhase.WORKTREE, 1, 0);
    store.upsert("a/b", ChangePhase.WORKTREE, 1, 0);
    store.upsert("a.b", ChangePhase.WORKTREE, 1, 0);

    const paths = new Reporter().sortedRecords(store).map((record) => record.path);

    expect(paths).toEqual(["a.b", "a/b", "�.txt", "\u{1F600}.txt"]);
  });

  it("should widen the index column past nine rows", () => {
    const store = new ChangeRecordStore();
    for (let i = 0; i < 10; i++) {
      store.upsert(`file${i}.txt`, ChangePhase.WORKTREE, 1, 0);
    }

    const rows = rowsOf(new Reporter().render(store));

    expect(rows[8]).toBe("  9:    unchanged        +1/-0 file8.txt");
    expect(rows[9]).toBe(" 10:    unchanged        +1/-0 file9.txt");
  });

  it("should grow a cell wider than its column instead of truncating", () => {
    const store = new ChangeRecordStore();
    store.upsert("big.bin", ChangePhase.INDEX, 12345678901, 0);
    store.upsert("big.bin", ChangePhase.WORKTREE, 9007199254740991, 9007199254740991);

    expect(rowsOf(new Reporter().render(store))).toEqual([
      "  1: +12345678901/-0 +9007199254740991/-9007199254740991 big.bin",
    ]);
  });

  it("should color only the header", () => {
    const store = new ChangeRecordStore();
    store.upsert("a.txt", ChangePhase.WORKTREE, 3, 1);

    const output = new Reporter({ palette: DEFAULT_PALETTE }).render(store);

    expect(output).toBe(
      "      \x1b[1m      staged     unstaged path\x1b[m\n" + "  1:    unchanged        +3/-1 a.txt\n" + "\n",
    );
  });

  it("should produce the uncolored report when the header color is empty", () => {
    const store = new ChangeRecordStore();
    store.upsert("a.txt", ChangePhase.WORKTREE, 3, 1);

    const plain = new Reporter().render(store);
    const blank = new Reporter({ palette: { ...DEFAULT_PALETTE, header: "" } }).render(store);

    expect(blank).toBe(plain);
  });

  it("should render identically twice from the same store", () => {
    const store = new ChangeRecordStore();
    store.upsert("z.txt", ChangePhase.WORKTREE, 1, 2);
    store.upsert("m.txt", ChangePhase.INDEX, 3, 4);
    const reporter = new Reporter();

    expect(reporter.render(store)).toBe(reporter.render(store));
  });

  it("should use custom labels", () => {
    const store = new ChangeRecordStore();
    store.upsert("a.txt", ChangePhase.WORKTREE, 3, 1);

    const output = new Reporter({ labels: { unchanged: "-", staged: "index" } }).render(store);

    expect(output).toBe(
      "             index     unstaged path\n" + "  1:            -        +3/-1 a.txt\n" + "\n",
    );
  });

  it("should write the rendered report to the output", () => {
    const store = new ChangeRecordStore();
    store.upsert("a.txt", ChangePhase.WORKTREE, 3, 1);
    const chunks: string[] = [];

    new Reporter().print(store, { write: (chunk: string) => chunks.push(chunk) });

    expect(chunks).toEqual([new Reporter().render(store)]);
  });
});

describe("formatDelta", () => {
  it("should format non-zero counts", () => {
    expect(formatDelta({ added: 0, deleted: 2 }, "nothing")).toBe("+0/-2");
    expect(formatDelta({ added: 5, deleted: 0 }, "nothing")).toBe("+5/-0");
  });

  it("should use the label for zero counts", () => {
    expect(formatDelta({ added: 0, deleted: 0 }, "unchanged")).toBe("unchanged");
  });
});

describe("comparePaths", () => {
  it("should compare byte-wise", () => {
    expect(comparePaths("a", "b")).toBeLessThan(0);
    expect(comparePaths("b", "a")).toBeGreaterThan(0);
    expect(comparePaths("a", "a")).toBe(0);
    expect(comparePaths("Z", "a")).toBeLessThan(0);
    expect(comparePaths("a", "ab")).toBeLessThan(0);
  });
});
