// ── Core types ─────────────────────────────────────────────────────────────
export { createResource } from "./types.js";
export type { Directive, ResolvedResource, Resource, ResourceId, TextRange } from "./types.js";
export { silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// ── Syntax trees ───────────────────────────────────────────────────────────
export * from "./syntax/index.js";

// ── Directives ─────────────────────────────────────────────────────────────
export * from "./directives/index.js";

// ── Merge ──────────────────────────────────────────────────────────────────
export { MergeEngine } from "./merge/merge-engine.js";
export type { MergeOptions, MergeResult } from "./merge/merge-engine.js";
export { createMergeContext, ResolvedReferenceTable } from "./merge/context.js";
export type { MergeContext } from "./merge/context.js";
export { computeSpliceBounds } from "./merge/splice-bounds.js";
export type { SpliceBounds } from "./merge/splice-bounds.js";
export { SourceMap, SourceMapBuilder } from "./merge/source-map.js";
export type { OriginalLocation, OriginalRange, SourceMapSegment, SourceSegment } from "./merge/source-map.js";

// ── Diagnostics ────────────────────────────────────────────────────────────
export {
  createDiagnostic,
  describeDiagnostic,
  DIAGNOSTIC_CODES,
  DiagnosticCollection,
} from "./diagnostics/diagnostic.js";
export type {
  Diagnostic,
  DiagnosticDetails,
  DiagnosticKind,
  DiagnosticSeverity,
} from "./diagnostics/diagnostic.js";
export { diagnosticLineColumn, formatCompilerStyle, formatDiagnostic } from "./diagnostics/formatter.js";
export type { ContentLookup } from "./diagnostics/formatter.js";
export { LineMap, resolveLineBoundaries } from "./text/line-map.js";
export type { LineColumn } from "./text/line-map.js";

// ── Resources & preprocessing ──────────────────────────────────────────────
export * from "./resources/index.js";
export * from "./preprocessor/index.js";
