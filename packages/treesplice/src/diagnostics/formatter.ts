/**
 * Rendering of diagnostics with human-friendly line/column locations.
 */
import type { SyntaxTree } from "../syntax/index.js";
import { LineMap } from "../text/line-map.js";
import type { ResourceId } from "../types.js";
import { describeDiagnostic, type Diagnostic } from "./diagnostic.js";

/** Looks up a resource's content so offsets can be mapped to lines. */
export type ContentLookup = (resource: ResourceId) => SyntaxTree | undefined;

/**
 * `line:column` (or `l:c-l:c`) for a diagnostic's resource and location.
 * Undefined when either is missing or the content cannot be found.
 */
export function diagnosticLineColumn(diagnostic: Diagnostic, getContent: ContentLookup): string | undefined {
  if (diagnostic.resource === undefined || !diagnostic.location) return undefined;
  const content = getContent(diagnostic.resource);
  if (!content) return undefined;
  return LineMap.fromTree(content).formatRange(diagnostic.location);
}

/**
 * The diagnostic's description with a ` (at resource@line:column)` suffix
 * when a location can be computed.
 */
export function formatDiagnostic(diagnostic: Diagnostic, getContent: ContentLookup): string {
  const text = describeDiagnostic(diagnostic);
  const lineColumn = diagnostic.lineColumn ?? diagnosticLineColumn(diagnostic, getContent);
  if (!lineColumn || diagnostic.resource === undefined) return text;
  if (text.includes(`@${lineColumn}`)) return text;
  return `${text} (at ${diagnostic.resource}@${lineColumn})`;
}

/**
 * Compiler-style rendering:
 *
 *   main(2,1): error MERGE002: No resolved resource for import "lib"
 */
export function formatCompilerStyle(
  diagnostic: Diagnostic,
  getContent: ContentLookup,
  formatResource: (resource: ResourceId) => string = (r) => r,
): string {
  const head = `${diagnostic.severity} ${diagnostic.code || "DIAG"}: ${diagnostic.message}`;
  if (diagnostic.resource === undefined) return head;

  const resource = formatResource(diagnostic.resource);
  const content = getContent(diagnostic.resource);
  const location = content && diagnostic.location
    ? LineMap.fromTree(content).formatRangeCompiler(diagnostic.location)
    : undefined;
  return location ? `${resource}(${location}): ${head}` : `${resource}: ${head}`;
}
