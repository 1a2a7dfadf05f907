import type { SyntaxNode } from "../syntax/index.js";

/**
 * Offsets needed to account for trivia when a directive node is replaced.
 *
 *   [node.position, prefixEnd)   leading trivia   → preserved, owning resource
 *   [prefixEnd, suffixStart)     node content     → replaced by the dependency
 *   [suffixStart, fullEnd)       trailing trivia  → preserved, owning resource
 */
export type SpliceBounds = {
  /** Start of the node's first token text */
  prefixEnd: number;
  /** End of the node's last token text */
  suffixStart: number;
  /** End of the node, trailing trivia included */
  fullEnd: number;
};

/**
 * Undefined when the node has no tokens or the offsets are not ordered
 * inside the node's span; callers fall back to coarse mapping instead of
 * reporting a misleading one.
 */
export function computeSpliceBounds(node: SyntaxNode): SpliceBounds | undefined {
  const first = node.firstToken();
  const last = node.lastToken();
  if (!first || !last) return undefined;

  const prefixEnd = first.tokenStart;
  const suffixStart = last.tokenEnd;
  const fullEnd = node.end;
  if (!(node.position <= prefixEnd && prefixEnd <= suffixStart && suffixStart <= fullEnd)) {
    return undefined;
  }
  return { prefixEnd, suffixStart, fullEnd };
}
