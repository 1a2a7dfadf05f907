import type { SyntaxNode } from "../syntax/index.js";
import type { Directive } from "../types.js";

/**
 * Extracts the reference string from a directive node.
 * Returning undefined, "" or whitespace makes the node a non-dependency.
 */
export interface ReferenceExtractor {
  extractReference(node: SyntaxNode): string | undefined;
}

/**
 * Reads the first string-literal child of the node and strips its quotes:
 * `import "lib/math"` → `lib/math`.
 */
export const stringReferenceExtractor: ReferenceExtractor = {
  extractReference(node) {
    const literal = node.children.find((c) => c.isToken && c.kind === "string");
    if (!literal) return undefined;
    return unquote(literal.tokenText);
  },
};

function unquote(text: string): string {
  if (text.length >= 2) {
    const quote = text[0];
    if ((quote === '"' || quote === "'") && text[text.length - 1] === quote) {
      return text.slice(1, -1);
    }
  }
  return text;
}

export function isBlankReference(reference: string | undefined): boolean {
  return reference === undefined || reference.trim() === "";
}

/**
 * Location policy: a directive's location is the zero-length range anchored
 * at its node start. Reference policy: blank references are not dependencies.
 */
export const directiveModel = {
  getLocation(directive: Directive) {
    return directive.location;
  },
  tryGetReference(directive: Directive): string | undefined {
    return isBlankReference(directive.reference) ? undefined : directive.reference;
  },
};
