/**
 * Schema binding: recognise syntax nodes (e.g. an `import "x"` directive) in
 * a token tree by matching patterns against runs of sibling nodes.
 */
import {
  greenBlock,
  greenSyntax,
  type GreenNode,
} from "./green.js";

export type PatternElement =
  | { kind: "ident"; text?: string }
  | { kind: "string" }
  | { kind: "number" }
  | { kind: "symbol"; text: string }
  | { kind: "block"; opener?: string }
  | { kind: "any" };

export type Pattern = {
  readonly elements: readonly PatternElement[];
};

export type SyntaxDefinition = {
  /** Node kind given to every match, e.g. "Import" */
  readonly kind: string;
  readonly pattern: Pattern;
};

/**
 * Fluent builder for sibling patterns.
 *
 * ```ts
 * const importPattern = new PatternBuilder().ident("import").string().build();
 * ```
 */
export class PatternBuilder {
  private readonly elements: PatternElement[] = [];

  /** An identifier, optionally with exact text */
  ident(text?: string): this {
    this.elements.push(text === undefined ? { kind: "ident" } : { kind: "ident", text });
    return this;
  }

  string(): this {
    this.elements.push({ kind: "string" });
    return this;
  }

  number(): this {
    this.elements.push({ kind: "number" });
    return this;
  }

  /** Punctuation; multi-character symbols match one operator token per character */
  symbol(text: string): this {
    if (text.length === 0) throw new RangeError("Symbol text must not be empty");
    for (const ch of text) this.elements.push({ kind: "symbol", text: ch });
    return this;
  }

  /** A bracketed block, optionally restricted to an opener: "(", "{" or "[" */
  block(opener?: string): this {
    this.elements.push(opener === undefined ? { kind: "block" } : { kind: "block", opener });
    return this;
  }

  any(): this {
    this.elements.push({ kind: "any" });
    return this;
  }

  build(): Pattern {
    if (this.elements.length === 0) {
      throw new Error("A pattern needs at least one element");
    }
    return { elements: [...this.elements] };
  }
}

export class SchemaBuilder {
  private readonly definitions: SyntaxDefinition[] = [];

  defineSyntax(kind: string, pattern: Pattern): this {
    if (this.definitions.some((d) => d.kind === kind)) {
      throw new Error(`Syntax "${kind}" is already defined`);
    }
    this.definitions.push({ kind, pattern });
    return this;
  }

  build(): Schema {
    return new Schema(this.definitions);
  }
}

export class Schema {
  /** A schema without syntax definitions: binding only marks the tree as bound. */
  static readonly default = new Schema([]);

  static create(): SchemaBuilder {
    return new SchemaBuilder();
  }

  readonly definitions: readonly SyntaxDefinition[];

  constructor(definitions: readonly SyntaxDefinition[]) {
    this.definitions = [...definitions];
  }

  defines(kind: string): boolean {
    return this.definitions.some((d) => d.kind === kind);
  }
}

// ── Binding ────────────────────────────────────────────────────────────────

/**
 * Bind `nodes` (one sibling list) against `schema`. Block interiors are
 * bound first; then the list is scanned left to right and the first
 * definition whose pattern matches at the current index wraps the run.
 */
export function bindNodes(nodes: readonly GreenNode[], schema: Schema): GreenNode[] {
  const inner = nodes.map((node) =>
    node.type === "block"
      ? greenBlock(node.opener, bindNodes(node.children, schema), node.closer)
      : node,
  );
  if (schema.definitions.length === 0) return inner;

  const out: GreenNode[] = [];
  let i = 0;
  while (i < inner.length) {
    const match = matchAt(inner, i, schema);
    if (match) {
      out.push(greenSyntax(match.kind, inner.slice(i, i + match.length)));
      i += match.length;
    } else {
      out.push(inner[i]);
      i += 1;
    }
  }
  return out;
}

function matchAt(
  nodes: readonly GreenNode[],
  index: number,
  schema: Schema,
): { kind: string; length: number } | undefined {
  for (const def of schema.definitions) {
    const elements = def.pattern.elements;
    if (index + elements.length > nodes.length) continue;
    if (elements.every((el, k) => matchesElement(nodes[index + k], el))) {
      return { kind: def.kind, length: elements.length };
    }
  }
  return undefined;
}

function matchesElement(node: GreenNode, element: PatternElement): boolean {
  switch (element.kind) {
    case "any":
      return true;
    case "block":
      return node.type === "block" && (element.opener === undefined || node.opener.text === element.opener);
    case "ident":
      return node.type === "token" && node.kind === "identifier" && (element.text === undefined || node.text === element.text);
    case "string":
      return node.type === "token" && node.kind === "string";
    case "number":
      return node.type === "token" && node.kind === "number";
    case "symbol":
      return node.type === "token" && node.kind === "operator" && node.text === element.text;
  }
}
