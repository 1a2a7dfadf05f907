import type { SyntaxNode, SyntaxTree } from "../syntax/index.js";
import type { Directive, ResourceId } from "../types.js";
import { isBlankReference, type ReferenceExtractor } from "./reference.js";

/** Thrown when directive discovery is asked to scan a tree that is not schema-bound. */
export class NotBoundError extends Error {
  constructor(readonly resource?: ResourceId) {
    super(
      resource !== undefined
        ? `Directive parsing requires a schema-bound tree (resource "${resource}" is not bound)`
        : "Directive parsing requires a schema-bound tree",
    );
    this.name = "NotBoundError";
  }
}

export type DiscoveredDirective = {
  directive: Directive;
  node: SyntaxNode;
};

/**
 * Discovers directive nodes of one schema kind.
 *
 * Nodes are ordered by start offset, then sibling index; nodes with a blank
 * reference are dropped before ordinals are assigned. The position of a
 * directive in the returned list is its ordinal, the join key between
 * discovery and merge-time resolution, and is stable across calls on the
 * same tree.
 */
export class DirectiveParser {
  constructor(
    readonly kind: string,
    readonly extractor: ReferenceExtractor,
  ) {}

  parse(tree: SyntaxTree, resource: ResourceId): Directive[] {
    return this.parseWithNodes(tree, resource).map((d) => d.directive);
  }

  parseWithNodes(tree: SyntaxTree, resource: ResourceId): DiscoveredDirective[] {
    if (!tree.hasSchema) throw new NotBoundError(resource);

    const found: DiscoveredDirective[] = [];
    for (const node of tree.select(this.kind)) {
      const reference = this.extractor.extractReference(node);
      if (reference === undefined || isBlankReference(reference)) continue;
      found.push({
        node,
        directive: {
          reference,
          location: { start: node.position, end: node.position },
          resource,
        },
      });
    }
    return found;
  }
}
