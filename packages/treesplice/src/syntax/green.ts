/**
 * Immutable ("green") node data.
 *
 * Green nodes carry text and shape but no positions, so a subtree can be
 * shared between trees (a dependency's processed children are spliced into
 * every dependent without copying). Positions live on the red view in
 * `tree.ts`.
 */
import type { TokenKind } from "./lexer.js";

export type GreenToken = {
  readonly type: "token";
  readonly kind: TokenKind;
  readonly text: string;
  /** Incidental text before the token */
  readonly leading: string;
  /** Incidental text after the token, up to and including the first newline */
  readonly trailing: string;
  readonly width: number;
};

export type GreenBlock = {
  readonly type: "block";
  readonly opener: GreenToken;
  readonly children: readonly GreenNode[];
  /** Missing when the block was still open at end of input */
  readonly closer: GreenToken | undefined;
  readonly width: number;
};

export type GreenSyntax = {
  readonly type: "syntax";
  /** Schema-defined kind, e.g. "Import" */
  readonly kind: string;
  readonly children: readonly GreenNode[];
  readonly width: number;
};

export type GreenNode = GreenToken | GreenBlock | GreenSyntax;

export function greenToken(kind: TokenKind, text: string, leading = "", trailing = ""): GreenToken {
  return {
    type: "token",
    kind,
    text,
    leading,
    trailing,
    width: leading.length + text.length + trailing.length,
  };
}

export function greenBlock(
  opener: GreenToken,
  children: readonly GreenNode[],
  closer: GreenToken | undefined,
): GreenBlock {
  return {
    type: "block",
    opener,
    children,
    closer,
    width: opener.width + sumWidth(children) + (closer?.width ?? 0),
  };
}

export function greenSyntax(kind: string, children: readonly GreenNode[]): GreenSyntax {
  return { type: "syntax", kind, children, width: sumWidth(children) };
}

export function sumWidth(nodes: readonly GreenNode[]): number {
  let total = 0;
  for (const node of nodes) total += node.width;
  return total;
}

/** Direct children in source order, including a block's opener and closer. */
export function greenChildren(node: GreenNode): readonly GreenNode[] {
  switch (node.type) {
    case "token":
      return [];
    case "syntax":
      return node.children;
    case "block":
      return node.closer
        ? [node.opener, ...node.children, node.closer]
        : [node.opener, ...node.children];
  }
}

export function writeGreen(node: GreenNode, out: string[]): void {
  if (node.type === "token") {
    out.push(node.leading, node.text, node.trailing);
    return;
  }
  for (const child of greenChildren(node)) writeGreen(child, out);
}

export function greenText(nodes: readonly GreenNode[]): string {
  const out: string[] = [];
  for (const node of nodes) writeGreen(node, out);
  return out.join("");
}

export function firstGreenToken(node: GreenNode): GreenToken | undefined {
  if (node.type === "token") return node;
  for (const child of greenChildren(node)) {
    const found = firstGreenToken(child);
    if (found) return found;
  }
  return undefined;
}

export function lastGreenToken(node: GreenNode): GreenToken | undefined {
  if (node.type === "token") return node;
  const children = greenChildren(node);
  for (let i = children.length - 1; i >= 0; i--) {
    const found = lastGreenToken(children[i]);
    if (found) return found;
  }
  return undefined;
}

/**
 * Rebuild `node` with `prefix` prepended to the leading trivia of its first
 * token. Returns the node unchanged when it has no token.
 */
export function withLeadingTrivia(node: GreenNode, prefix: string): GreenNode {
  if (prefix === "") return node;
  if (node.type === "token") return prependLeading(node, prefix);
  if (node.type === "block") {
    return greenBlock(prependLeading(node.opener, prefix), node.children, node.closer);
  }
  const children = prependTrivia(node.children, prefix);
  return children ? greenSyntax(node.kind, children) : node;
}

/**
 * Rebuild `node` with `suffix` appended to the trailing trivia of its last
 * token. Returns the node unchanged when it has no token.
 */
export function withTrailingTrivia(node: GreenNode, suffix: string): GreenNode {
  if (suffix === "") return node;
  if (node.type === "token") return appendTrailing(node, suffix);
  if (node.type === "block") {
    if (node.closer) {
      return greenBlock(node.opener, node.children, appendTrailing(node.closer, suffix));
    }
    const children = appendTrivia(node.children, suffix);
    if (children) return greenBlock(node.opener, children, undefined);
    return greenBlock(appendTrailing(node.opener, suffix), node.children, undefined);
  }
  const children = appendTrivia(node.children, suffix);
  return children ? greenSyntax(node.kind, children) : node;
}

function prependLeading(token: GreenToken, prefix: string): GreenToken {
  return greenToken(token.kind, token.text, prefix + token.leading, token.trailing);
}

function appendTrailing(token: GreenToken, suffix: string): GreenToken {
  return greenToken(token.kind, token.text, token.leading, token.trailing + suffix);
}

/**
 * Prepend `prefix` to the first token found in `nodes`. Returns undefined
 * when the list holds no token.
 */
export function prependTrivia(nodes: readonly GreenNode[], prefix: string): GreenNode[] | undefined {
  for (let i = 0; i < nodes.length; i++) {
    if (firstGreenToken(nodes[i]) !== undefined) {
      const copy = nodes.slice();
      copy[i] = withLeadingTrivia(nodes[i], prefix);
      return copy;
    }
  }
  return undefined;
}

/**
 * Append `suffix` to the last token found in `nodes`. Returns undefined
 * when the list holds no token.
 */
export function appendTrivia(nodes: readonly GreenNode[], suffix: string): GreenNode[] | undefined {
  for (let i = nodes.length - 1; i >= 0; i--) {
    if (lastGreenToken(nodes[i]) !== undefined) {
      const copy = nodes.slice();
      copy[i] = withTrailingTrivia(nodes[i], suffix);
      return copy;
    }
  }
  return undefined;
}
