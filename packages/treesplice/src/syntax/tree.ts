import type { IToken } from "chevrotain";
import { CLOSER_FOR, lex, Newline, tokenKind } from "./lexer.js";
import {
  greenBlock,
  greenChildren,
  greenSyntax,
  greenText,
  greenToken,
  type GreenNode,
  type GreenToken,
} from "./green.js";
import { bindNodes, Schema } from "./schema.js";
import { SyntaxEditor } from "./editor.js";

/** Kind of the synthetic node that owns a tree's top-level children */
export const ROOT_KIND = "#root";

/**
 * Positioned ("red") view over a green node.
 *
 * `position` and `end` span the node's full text, including the leading
 * trivia of its first token and the trailing trivia of its last token.
 */
export class SyntaxNode {
  private cachedChildren: SyntaxNode[] | undefined;

  constructor(
    readonly green: GreenNode,
    readonly position: number,
    readonly parent: SyntaxNode | undefined,
    readonly siblingIndex: number,
  ) {}

  /** Token kind, "block", or the schema kind of a bound syntax node */
  get kind(): string {
    if (this.green.type === "token") return this.green.kind;
    if (this.green.type === "block") return "block";
    return this.green.kind;
  }

  get isToken(): boolean {
    return this.green.type === "token";
  }

  get isSyntax(): boolean {
    return this.green.type === "syntax" && this.green.kind !== ROOT_KIND;
  }

  get width(): number {
    return this.green.width;
  }

  get end(): number {
    return this.position + this.green.width;
  }

  /** Child-index path from the root, unique within one tree */
  get path(): string {
    return this.parent ? `${this.parent.path}/${this.siblingIndex}` : "";
  }

  /** Full text including trivia */
  get text(): string {
    return greenText([this.green]);
  }

  /** Token text without trivia; empty for non-token nodes */
  get tokenText(): string {
    return this.green.type === "token" ? this.green.text : "";
  }

  /** Start of the token text (after leading trivia); tokens only */
  get tokenStart(): number {
    return this.green.type === "token" ? this.position + this.green.leading.length : this.position;
  }

  /** End of the token text (before trailing trivia); tokens only */
  get tokenEnd(): number {
    return this.green.type === "token" ? this.tokenStart + this.green.text.length : this.end;
  }

  get children(): readonly SyntaxNode[] {
    if (!this.cachedChildren) {
      const out: SyntaxNode[] = [];
      let offset = this.position;
      greenChildren(this.green).forEach((child, index) => {
        out.push(new SyntaxNode(child, offset, this, index));
        offset += child.width;
      });
      this.cachedChildren = out;
    }
    return this.cachedChildren;
  }

  firstToken(): SyntaxNode | undefined {
    if (this.isToken) return this;
    for (const child of this.children) {
      const found = child.firstToken();
      if (found) return found;
    }
    return undefined;
  }

  lastToken(): SyntaxNode | undefined {
    if (this.isToken) return this;
    const children = this.children;
    for (let i = children.length - 1; i >= 0; i--) {
      const found = children[i].lastToken();
      if (found) return found;
    }
    return undefined;
  }

  /** Pre-order walk of every node below this one */
  *descendants(): Generator<SyntaxNode> {
    for (const child of this.children) {
      yield child;
      yield* child.descendants();
    }
  }
}

export class SyntaxTree {
  static readonly empty = new SyntaxTree([], "", undefined);

  /** Parse without binding; `select` finds no syntax nodes and the tree reports `hasSchema === false`. */
  static parse(text: string): SyntaxTree {
    const { nodes, endTrivia } = buildGreen(text);
    return new SyntaxTree(nodes, endTrivia, undefined);
  }

  static parseAndBind(text: string, schema: Schema): SyntaxTree {
    const { nodes, endTrivia } = buildGreen(text);
    return new SyntaxTree(bindNodes(nodes, schema), endTrivia, schema);
  }

  /** @internal used by the editor to materialise a committed edit */
  static fromGreen(nodes: readonly GreenNode[], endTrivia: string, schema: Schema | undefined): SyntaxTree {
    return new SyntaxTree(nodes, endTrivia, schema);
  }

  readonly root: SyntaxNode;
  /** Text of a document that has no tokens at all */
  readonly endTrivia: string;
  readonly schema: Schema | undefined;

  private constructor(nodes: readonly GreenNode[], endTrivia: string, schema: Schema | undefined) {
    this.root = new SyntaxNode(greenSyntax(ROOT_KIND, nodes), 0, undefined, 0);
    this.endTrivia = endTrivia;
    this.schema = schema;
  }

  get hasSchema(): boolean {
    return this.schema !== undefined;
  }

  get textLength(): number {
    return this.root.width + this.endTrivia.length;
  }

  toText(): string {
    return this.root.text + this.endTrivia;
  }

  descendants(): Generator<SyntaxNode> {
    return this.root.descendants();
  }

  /** Bound syntax nodes of `kind`, ordered by start offset then sibling index */
  select(kind: string): SyntaxNode[] {
    const found: SyntaxNode[] = [];
    for (const node of this.root.descendants()) {
      if (node.isSyntax && node.kind === kind) found.push(node);
    }
    return found.sort((a, b) => a.position - b.position || a.siblingIndex - b.siblingIndex);
  }

  /** Offsets immediately following each "\n" */
  newlinePositions(): number[] {
    const text = this.toText();
    const positions: number[] = [];
    for (let i = text.indexOf("\n"); i !== -1; i = text.indexOf("\n", i + 1)) {
      positions.push(i + 1);
    }
    return positions;
  }

  createEditor(): SyntaxEditor {
    return new SyntaxEditor(this);
  }
}

// ── Tree construction ──────────────────────────────────────────────────────

type MutableToken = { token: IToken; leading: string; trailing: string };

function buildGreen(text: string): { nodes: GreenNode[]; endTrivia: string } {
  const { tokens, trivia } = lex(text);
  if (tokens.length === 0) return { nodes: [], endTrivia: text };

  const attached = attachTrivia(tokens, trivia);
  return { nodes: nestBlocks(attached), endTrivia: "" };
}

/**
 * Trailing trivia runs up to and including the first newline after a token;
 * any other trivia leads the next token. Trivia after the last token trails it.
 */
function attachTrivia(tokens: IToken[], trivia: IToken[]): MutableToken[] {
  const out: MutableToken[] = [];
  let pending = "";
  let trailingOpen = false;
  let t = 0;

  const flushTriviaBefore = (offset: number) => {
    while (t < trivia.length && trivia[t].startOffset < offset) {
      const piece = trivia[t];
      const last = out[out.length - 1];
      if (trailingOpen && last) {
        last.trailing += piece.image;
        if (piece.tokenType === Newline) trailingOpen = false;
      } else {
        pending += piece.image;
      }
      t++;
    }
  };

  for (const token of tokens) {
    flushTriviaBefore(token.startOffset);
    out.push({ token, leading: pending, trailing: "" });
    pending = "";
    trailingOpen = true;
  }
  flushTriviaBefore(Number.POSITIVE_INFINITY);

  const last = out[out.length - 1];
  if (pending !== "" && last) last.trailing += pending;
  return out;
}

type Frame = { opener: GreenToken; children: GreenNode[] };

function nestBlocks(tokens: MutableToken[]): GreenNode[] {
  const top: GreenNode[] = [];
  const stack: Frame[] = [];
  const current = () => (stack.length > 0 ? stack[stack.length - 1].children : top);

  for (const { token, leading, trailing } of tokens) {
    const kind = tokenKind(token);
    const green = greenToken(kind, token.image, leading, trailing);
    if (kind === "open") {
      stack.push({ opener: green, children: [] });
      continue;
    }
    const frame = stack[stack.length - 1];
    if (kind === "close" && frame && CLOSER_FOR[frame.opener.text] === green.text) {
      stack.pop();
      current().push(greenBlock(frame.opener, frame.children, green));
      continue;
    }
    // Stray or mismatched closers stay as plain tokens
    current().push(green);
  }

  // Unclosed blocks end at end of input
  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    current().push(greenBlock(frame.opener, frame.children, undefined));
  }
  return top;
}
