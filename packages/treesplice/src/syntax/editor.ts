import {
  appendTrivia,
  greenBlock,
  greenSyntax,
  greenToken,
  prependTrivia,
  withLeadingTrivia,
  type GreenNode,
  type GreenToken,
} from "./green.js";
import { SyntaxTree, type SyntaxNode } from "./tree.js";

type Edit =
  | { kind: "replace"; nodes: readonly GreenNode[] }
  | { kind: "remove" };

/** Trivia waiting for the next emitted token */
type RebuildState = { carry: string };

/**
 * Batches structural edits against one tree and applies them atomically on
 * `commit()`. The source tree is never mutated.
 *
 * - `replace(node, nodes)` moves the node's leading trivia in front of the
 *   first inserted token and its trailing trivia after the last one.
 * - `remove(node)` keeps the node's leading and trailing trivia: it moves to
 *   the next token in document order (or the last token when nothing follows).
 *
 * Edits nested inside a replaced or removed node are ignored.
 */
export class SyntaxEditor {
  private readonly edits = new Map<string, Edit>();
  /** Paths of every ancestor of an edited node, to skip untouched subtrees */
  private readonly touched = new Set<string>();
  private committed = false;

  constructor(readonly tree: SyntaxTree) {}

  get pendingEdits(): number {
    return this.edits.size;
  }

  replace(node: SyntaxNode, replacement: readonly SyntaxNode[]): this {
    return this.record(node, { kind: "replace", nodes: replacement.map((n) => n.green) });
  }

  remove(node: SyntaxNode): this {
    return this.record(node, { kind: "remove" });
  }

  commit(): SyntaxTree {
    if (this.committed) {
      throw new Error("SyntaxEditor.commit() can only be called once");
    }
    this.committed = true;
    const { tree } = this;
    if (this.edits.size === 0) return tree;

    const state: RebuildState = { carry: "" };
    let nodes = this.rebuildList(tree.root.children, state);
    let endTrivia = tree.endTrivia;
    if (state.carry !== "") {
      const appended = appendTrivia(nodes, state.carry);
      if (appended) nodes = appended;
      else endTrivia += state.carry;
    }
    return SyntaxTree.fromGreen(nodes, endTrivia, tree.schema);
  }

  private record(node: SyntaxNode, edit: Edit): this {
    if (this.committed) {
      throw new Error("Cannot edit after commit()");
    }
    if (!this.owns(node)) {
      throw new Error("Node does not belong to the tree being edited");
    }
    const parent = node.parent;
    if (!parent) {
      throw new Error("The root node cannot be edited");
    }
    if (parent.green.type === "block" && (node.siblingIndex === 0 || node.green === parent.green.closer)) {
      throw new Error("Block delimiters cannot be edited on their own; edit the block");
    }
    this.edits.set(node.path, edit);
    for (let p: SyntaxNode | undefined = parent; p; p = p.parent) this.touched.add(p.path);
    return this;
  }

  private owns(node: SyntaxNode): boolean {
    let top = node;
    while (top.parent) top = top.parent;
    return top === this.tree.root;
  }

  private rebuildList(nodes: readonly SyntaxNode[], state: RebuildState): GreenNode[] {
    const out: GreenNode[] = [];
    for (const node of nodes) out.push(...this.rebuild(node, state));
    return out;
  }

  private rebuild(node: SyntaxNode, state: RebuildState): GreenNode[] {
    const edit = this.edits.get(node.path);
    if (edit) return this.applyEdit(node, edit, state);

    if (!this.touched.has(node.path)) {
      return [this.takeCarry(node.green, state)];
    }

    const green = node.green;
    if (green.type === "block") {
      const inner = node.children.slice(1, green.closer ? -1 : undefined);
      const opener = this.takeCarryToken(green.opener, state);
      const children = this.rebuildList(inner, state);
      const closer = green.closer ? this.takeCarryToken(green.closer, state) : undefined;
      return [greenBlock(opener, children, closer)];
    }
    if (green.type === "syntax") {
      const children = this.rebuildList(node.children, state);
      return children.length > 0 ? [greenSyntax(green.kind, children)] : [];
    }
    return [this.takeCarry(green, state)];
  }

  private applyEdit(node: SyntaxNode, edit: Edit, state: RebuildState): GreenNode[] {
    const first = node.firstToken();
    const last = node.lastToken();
    const leading = first ? node.text.slice(0, first.tokenStart - node.position) : "";
    const trailing = last ? node.text.slice(last.tokenEnd - node.position) : "";

    if (edit.kind === "replace") {
      const withLeading = prependTrivia(edit.nodes, state.carry + leading);
      if (withLeading) {
        state.carry = "";
        return appendTrivia(withLeading, trailing) ?? withLeading;
      }
    }
    // Removal, or a replacement without tokens: keep the node's exterior trivia
    state.carry += leading + trailing;
    return [];
  }

  private takeCarryToken(token: GreenToken, state: RebuildState): GreenToken {
    if (state.carry === "") return token;
    const updated = greenToken(token.kind, token.text, state.carry + token.leading, token.trailing);
    state.carry = "";
    return updated;
  }

  private takeCarry(green: GreenNode, state: RebuildState): GreenNode {
    if (state.carry === "") return green;
    const updated = withLeadingTrivia(green, state.carry);
    if (updated !== green) state.carry = "";
    return updated;
  }
}
