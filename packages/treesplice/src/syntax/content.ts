import { SyntaxTree } from "./tree.js";

/** Length of a tree in absolute character offsets, trivia included. */
export function treeLength(tree: SyntaxTree): number {
  return tree.textLength;
}

/**
 * Cut `[start, start + length)` out of `tree` and re-parse it with the same
 * schema. The result is a standalone parse, not a subtree of the original.
 */
export function sliceTree(tree: SyntaxTree, start: number, length: number): SyntaxTree {
  if (!Number.isInteger(start) || start < 0) {
    throw new RangeError(`Start must be a non-negative integer, got ${start}`);
  }
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`Length must be a non-negative integer, got ${length}`);
  }
  const textLength = tree.textLength;
  if (start + length > textLength) {
    throw new RangeError(`Start (${start}) + length (${length}) exceeds text length (${textLength})`);
  }
  if (length === 0) return SyntaxTree.empty;

  const sliced = tree.toText().slice(start, start + length);
  return tree.schema ? SyntaxTree.parseAndBind(sliced, tree.schema) : SyntaxTree.parse(sliced);
}
