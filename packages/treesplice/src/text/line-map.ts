import type { SyntaxTree } from "../syntax/index.js";
import type { TextRange } from "../types.js";

/** 1-based line/column coordinate. */
export type LineColumn = {
  line: number;
  column: number;
};

/**
 * Start offsets of every line after the first that begins inside
 * `[startOffset, endOffset)`. A boundary is the offset immediately following
 * a "\n"; `endOffset` is clamped to the tree's length.
 */
export function resolveLineBoundaries(tree: SyntaxTree, startOffset: number, endOffset: number): number[] {
  if (startOffset < 0) {
    throw new RangeError(`Start offset must be non-negative, got ${startOffset}`);
  }
  if (endOffset < 0) {
    throw new RangeError(`End offset must be non-negative, got ${endOffset}`);
  }
  if (endOffset < startOffset) {
    throw new RangeError(`End offset (${endOffset}) must be >= start offset (${startOffset})`);
  }
  const length = tree.textLength;
  if (startOffset >= length || startOffset === endOffset) return [];
  const end = Math.min(endOffset, length);
  return tree.newlinePositions().filter((o) => o >= startOffset && o < end);
}

/**
 * Maps absolute offsets of one document to 1-based line/column pairs by
 * binary search over its sorted line boundaries.
 */
export class LineMap {
  static fromTree(tree: SyntaxTree): LineMap {
    return new LineMap(resolveLineBoundaries(tree, 0, tree.textLength), tree.textLength);
  }

  static fromText(text: string): LineMap {
    const boundaries: number[] = [];
    for (let i = text.indexOf("\n"); i !== -1; i = text.indexOf("\n", i + 1)) {
      boundaries.push(i + 1);
    }
    return new LineMap(boundaries, text.length);
  }

  constructor(
    private readonly boundaries: readonly number[],
    readonly length: number,
  ) {}

  /** `undefined` for negative offsets; offsets past the end are clamped. */
  toLineColumn(offset: number): LineColumn | undefined {
    if (!Number.isFinite(offset) || offset < 0) return undefined;
    const clamped = Math.min(offset, this.length);
    const count = this.boundariesAtOrBefore(clamped);
    const lineStart = count === 0 ? 0 : this.boundaries[count - 1];
    return { line: count + 1, column: clamped - lineStart + 1 };
  }

  /** `line:column`, or `line:column-line:column` for non-empty ranges */
  formatRange(range: TextRange): string | undefined {
    const pair = this.rangeToLineColumns(range);
    if (!pair) return undefined;
    const [start, end] = pair;
    return sameLineColumn(start, end)
      ? `${start.line}:${start.column}`
      : `${start.line}:${start.column}-${end.line}:${end.column}`;
  }

  /** Compiler-style `line,column` or `line,column,endLine,endColumn` */
  formatRangeCompiler(range: TextRange): string | undefined {
    const pair = this.rangeToLineColumns(range);
    if (!pair) return undefined;
    const [start, end] = pair;
    return sameLineColumn(start, end)
      ? `${start.line},${start.column}`
      : `${start.line},${start.column},${end.line},${end.column}`;
  }

  private rangeToLineColumns(range: TextRange): [LineColumn, LineColumn] | undefined {
    const start = this.toLineColumn(range.start);
    const end = this.toLineColumn(range.end);
    return start && end ? [start, end] : undefined;
  }

  /** Number of boundaries `<= offset` */
  private boundariesAtOrBefore(offset: number): number {
    let lo = 0;
    let hi = this.boundaries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.boundaries[mid] <= offset) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}

function sameLineColumn(a: LineColumn, b: LineColumn): boolean {
  return a.line === b.line && a.column === b.column;
}
