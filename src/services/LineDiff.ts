/**
 * Line-oriented LCS diff.
 *
 * Produces a minimal edit script of keep/remove/add operations. Where several
 * minimal scripts exist, removals are emitted before additions, so a
 * replaced block always reads as "removes, then adds".
 */

import type { LineChange, ModifiedPair } from "./VersionComparison.types";

export type EditOp =
  | { op: "keep"; line: string }
  | { op: "remove"; line: string }
  | { op: "add"; line: string };

export interface CollapsedChanges {
  addedLines: string[];
  removedLines: string[];
  modifiedPairs: ModifiedPair[];
}

/** Split into lines with trailing whitespace trimmed */
export function toLines(text: string): string[] {
  if (!text) return [];
  return text.replace(/\r\n?/g, "\n").split("\n").map((line) => line.trimEnd());
}

export function linesEqual(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Suffix LCS table, `row(i)[j]` being the LCS length of `a[i..]` and `b[j..]`.
 *
 * Only every `stride`-th row is stored (stride about sqrt(n)); the rows between
 * two stored ones are rebuilt as a block when first asked for. Rows must be
 * requested in increasing order to rebuild each block once.
 */
class SuffixLcsRows {
  private readonly stride: number;
  private readonly checkpoints = new Map<number, Uint32Array>();
  private blockStart = -1;
  private block: Uint32Array[] = [];

  constructor(
    private readonly a: readonly string[],
    private readonly b: readonly string[]
  ) {
    const n = a.length;
    this.stride = Math.max(1, Math.ceil(Math.sqrt(n + 1)));

    let row = new Uint32Array(b.length + 1);
    this.checkpoints.set(n, row);
    for (let i = n - 1; i >= 0; i--) {
      row = this.above(row, i);
      if (i % this.stride === 0) this.checkpoints.set(i, row);
    }
  }

  row(i: number): Uint32Array {
    const stored = this.checkpoints.get(i);
    if (stored) return stored;

    const start = i - (i % this.stride);
    if (start !== this.blockStart) {
      const end = Math.min(start + this.stride, this.a.length);
      const block: Uint32Array[] = [];
      let current = this.checkpoint(end);
      for (let r = end - 1; r > start; r--) {
        current = this.above(current, r);
        block[r - start] = current;
      }
      this.block = block;
      this.blockStart = start;
    }
    return this.block[i - start];
  }

  private checkpoint(i: number): Uint32Array {
    const row = this.checkpoints.get(i);
    if (!row) throw new Error(`LCS row ${i} was not stored`);
    return row;
  }

  /** Row `i` from row `i + 1` */
  private above(below: Uint32Array, i: number): Uint32Array {
    const m = this.b.length;
    const row = new Uint32Array(m + 1);
    const line = this.a[i];
    for (let j = m - 1; j >= 0; j--) {
      row[j] = line === this.b[j] ? below[j + 1] + 1 : Math.max(below[j], row[j + 1]);
    }
    return row;
  }
}

/**
 * Minimal edit script turning `before` into `after`.
 */
export function diffLines(before: readonly string[], after: readonly string[]): EditOp[] {
  // Common prefix and suffix never take part in the LCS table
  let start = 0;
  while (start < before.length && start < after.length && before[start] === after[start]) {
    start++;
  }
  let endBefore = before.length;
  let endAfter = after.length;
  while (endBefore > start && endAfter > start && before[endBefore - 1] === after[endAfter - 1]) {
    endBefore--;
    endAfter--;
  }

  const ops: EditOp[] = [];
  for (let i = 0; i < start; i++) ops.push({ op: "keep", line: before[i] });

  const a = before.slice(start, endBefore);
  const b = after.slice(start, endAfter);
  const n = a.length;
  const m = b.length;

  const lcs = new SuffixLcsRows(a, b);

  let i = 0;
  let j = 0;
  while (i < n && j < m) {
    if (a[i] === b[j]) {
      ops.push({ op: "keep", line: a[i] });
      i++;
      j++;
    } else if (lcs.row(i + 1)[j] >= lcs.row(i)[j + 1]) {
      ops.push({ op: "remove", line: a[i] });
      i++;
    } else {
      ops.push({ op: "add", line: b[j] });
      j++;
    }
  }
  while (i < n) ops.push({ op: "remove", line: a[i++] });
  while (j < m) ops.push({ op: "add", line: b[j++] });

  for (let k = endBefore; k < before.length; k++) ops.push({ op: "keep", line: before[k] });

  return ops;
}

export function toLineChanges(ops: readonly EditOp[]): LineChange[] {
  return ops.map((o): LineChange => ({
    kind: o.op === "keep" ? "unchanged" : o.op === "add" ? "added" : "removed",
    content: o.line,
  }));
}

/**
 * Fold an edit script into independent adds/removes and replacement pairs.
 * A run of removes directly followed by a run of adds pairs up index by
 * index; whatever is left over on either side stays independent.
 */
export function collapseEditScript(ops: readonly EditOp[]): CollapsedChanges {
  const result: CollapsedChanges = { addedLines: [], removedLines: [], modifiedPairs: [] };

  let k = 0;
  while (k < ops.length) {
    const current = ops[k];
    if (current.op === "keep") {
      k++;
      continue;
    }

    if (current.op === "add") {
      result.addedLines.push(current.line);
      k++;
      continue;
    }

    const removed: string[] = [];
    while (k < ops.length && ops[k].op === "remove") removed.push(ops[k++].line);
    const added: string[] = [];
    while (k < ops.length && ops[k].op === "add") added.push(ops[k++].line);

    const paired = Math.min(removed.length, added.length);
    for (let p = 0; p < paired; p++) {
      result.modifiedPairs.push({ before: removed[p], after: added[p] });
    }
    result.removedLines.push(...removed.slice(paired));
    result.addedLines.push(...added.slice(paired));
  }

  return result;
}
