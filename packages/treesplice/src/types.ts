import type { SyntaxTree } from "./syntax/index.js";

/**
 * Opaque identity of a document.
 *
 * Not required to be path-shaped: callers may mint synthetic ("virtual:1"),
 * scheme-prefixed ("domain:lib/shared") or canonicalized ids. The resolver is
 * the sole authority on identity; two directives with the same reference
 * text can resolve to different ids.
 */
export type ResourceId = string;

/** Half-open offset range `[start, end)` inside one resource. */
export type TextRange = {
  start: number;
  end: number;
};

/** A document: its identity and its parsed content. */
export type Resource = {
  readonly id: ResourceId;
  readonly content: SyntaxTree;
};

/**
 * One directive occurrence discovered in a bound tree.
 *
 *   import "lib/math"   →   { reference: "lib/math", location: { start: 0, end: 0 }, resource: "main" }
 */
export type Directive = {
  /** Never empty or all-whitespace */
  readonly reference: string;
  /** Zero-length range anchored at the directive node's start */
  readonly location: TextRange;
  /** Resource that contains the directive */
  readonly resource: ResourceId;
};

/**
 * A resource together with the directives extracted from it, in discovery
 * order. Ordered lists of these are handed to the merge engine with
 * dependencies first and the root last.
 */
export type ResolvedResource = {
  readonly resource: Resource;
  readonly directives: readonly Directive[];
};

export function createResource(id: ResourceId, content: SyntaxTree): Resource {
  return { id, content };
}
