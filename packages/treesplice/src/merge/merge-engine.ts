import { SpanStatusCode } from "@opentelemetry/api";
import {
  createDiagnostic,
  type Diagnostic,
  type DiagnosticDetails,
  type DiagnosticKind,
} from "../diagnostics/diagnostic.js";
import { DirectiveParser, type DiscoveredDirective } from "../directives/parser.js";
import type { ReferenceExtractor } from "../directives/reference.js";
import { silentLogger, type Logger } from "../logger.js";
import { SyntaxTree } from "../syntax/index.js";
import { diagnosticsCounter, otelTracer, resourcesProcessedCounter } from "../telemetry.js";
import { LineMap } from "../text/line-map.js";
import type { ResolvedResource, Resource, ResourceId } from "../types.js";
import type { MergeContext } from "./context.js";
import { SourceMap, segmentsLength, type SourceSegment } from "./source-map.js";
import { computeSpliceBounds } from "./splice-bounds.js";

export type MergeOptions = {
  logger?: Logger;
  /** Checked before each resource is processed */
  signal?: AbortSignal;
  /** Called once per resource as it enters processing */
  onProcessResource?: (resource: ResourceId) => void;
};

export type MergeResult = {
  tree: SyntaxTree;
  sourceMap: SourceMap;
  diagnostics: Diagnostic[];
  success: boolean;
};

type ProcessedResource = {
  tree: SyntaxTree;
  /** Output of `tree` attributed back to original resources, in order */
  segments: readonly SourceSegment[];
};

type ResourceState =
  | { state: "processing" }
  | { state: "processed"; result: ProcessedResource };

/** What happens to one directive occurrence */
type SplicePlan = {
  discovered: DiscoveredDirective;
  /** Undefined when the occurrence is dropped */
  dependency: ProcessedResource | undefined;
};

// ── Merge engine ────────────────────────────────────────────────────────────

/**
 * Inlines resolved dependencies into their dependents, bottom-up, and builds
 * a source map from the merged output back to the original resources.
 *
 * Resources must arrive in dependency order with the root last; ordering
 * and cycle detection are the caller's job.
 */
export class MergeEngine {
  private readonly parser: DirectiveParser;
  private readonly logger: Logger;

  constructor(
    readonly kind: string,
    extractor: ReferenceExtractor,
    private readonly options: MergeOptions = {},
  ) {
    this.parser = new DirectiveParser(kind, extractor);
    this.logger = options.logger ?? silentLogger;
  }

  merge(orderedResources: readonly ResolvedResource[], context: MergeContext): MergeResult {
    return otelTracer.startActiveSpan(
      "treesplice.merge",
      { attributes: { "treesplice.resources": orderedResources.length } },
      (span) => {
        try {
          const result = this.mergeResources(orderedResources, context);
          span.setAttribute("treesplice.diagnostics", result.diagnostics.length);
          if (!result.success) {
            span.setStatus({ code: SpanStatusCode.ERROR, message: "merge reported errors" });
          }
          return result;
        } catch (err) {
          if (err instanceof Error) span.recordException(err);
          span.setStatus({ code: SpanStatusCode.ERROR, message: String(err) });
          throw err;
        } finally {
          span.end();
        }
      },
    );
  }

  private mergeResources(orderedResources: readonly ResolvedResource[], context: MergeContext): MergeResult {
    const root = orderedResources[orderedResources.length - 1];
    if (!root) {
      return this.result(SyntaxTree.empty, SourceMap.empty, context);
    }

    if (!root.resource.content.hasSchema) {
      this.report(
        context,
        "root-not-schema-bound",
        "Root resource must be schema-bound for merge",
        { resource: root.resource.id },
      );
      const tree = root.resource.content;
      context.sourceMapBuilder.addSegment(root.resource.id, 0, 0, tree.textLength);
      return this.result(tree, context.sourceMapBuilder.build(), context);
    }

    const states = new Map<ResourceId, ResourceState>();
    let merged: ProcessedResource | undefined;
    for (const entry of orderedResources) {
      merged = this.processResource(entry.resource, states, context);
    }
    // `root` is last, so `merged` is its result
    const tree = merged?.tree ?? root.resource.content;

    let generated = 0;
    for (const segment of merged?.segments ?? []) {
      context.sourceMapBuilder.addSegment(segment.resource, generated, segment.originalStart, segment.length);
      generated += segment.length;
    }
    if (generated < tree.textLength) {
      context.sourceMapBuilder.addSegment(root.resource.id, generated, generated, tree.textLength - generated);
    }
    return this.result(tree, context.sourceMapBuilder.build(), context);
  }

  private result(tree: SyntaxTree, sourceMap: SourceMap, context: MergeContext): MergeResult {
    return {
      tree,
      sourceMap,
      diagnostics: context.diagnostics.toArray(),
      success: !context.diagnostics.hasErrors,
    };
  }

  // ── Per-resource processing ───────────────────────────────────────────────

  private processResource(
    resource: Resource,
    states: Map<ResourceId, ResourceState>,
    context: MergeContext,
  ): ProcessedResource {
    const existing = states.get(resource.id);
    if (existing?.state === "processed") return existing.result;
    if (existing?.state === "processing") {
      throw new Error(`Resource "${resource.id}" is already being processed; the dependency graph has a cycle`);
    }

    this.options.signal?.throwIfAborted();
    states.set(resource.id, { state: "processing" });
    this.options.onProcessResource?.(resource.id);
    resourcesProcessedCounter.add(1);

    const result = this.spliceResource(resource, states, context);
    states.set(resource.id, { state: "processed", result });
    this.logger.debug(
      "[treesplice] processed %s (%d segments, %d chars)",
      resource.id,
      result.segments.length,
      result.tree.textLength,
    );
    return result;
  }

  private spliceResource(
    resource: Resource,
    states: ReadonlyMap<ResourceId, ResourceState>,
    context: MergeContext,
  ): ProcessedResource {
    const tree = resource.content;
    // Only the root is required to be bound; other unbound resources pass through
    if (!tree.hasSchema) return { tree, segments: [wholeResource(resource.id, tree)] };

    const discovered = this.parser.parseWithNodes(tree, resource.id);
    if (discovered.length === 0) return { tree, segments: [wholeResource(resource.id, tree)] };

    const plans = this.planSplices(resource, discovered, states, context);
    const accounted = accountSegments(resource, plans);
    const edited = applySplices(tree, plans);

    if (typeof accounted === "string") {
      this.logger.debug("[treesplice] %s: whole-resource mapping (%s)", resource.id, accounted);
      return { tree: edited, segments: [wholeResource(resource.id, edited)] };
    }
    const accountedLength = segmentsLength(accounted);
    if (accountedLength !== edited.textLength) {
      this.logger.debug(
        "[treesplice] %s: whole-resource mapping (segments cover %d of %d chars)",
        resource.id,
        accountedLength,
        edited.textLength,
      );
      return { tree: edited, segments: [wholeResource(resource.id, edited)] };
    }
    return { tree: edited, segments: accounted };
  }

  /** Looks up every occurrence's dependency and reports the ones that cannot be spliced */
  private planSplices(
    resource: Resource,
    discovered: readonly DiscoveredDirective[],
    states: ReadonlyMap<ResourceId, ResourceState>,
    context: MergeContext,
  ): SplicePlan[] {
    let lineMap: LineMap | undefined;
    const locate = (d: DiscoveredDirective): DiagnosticDetails => {
      lineMap ??= LineMap.fromTree(resource.content);
      return {
        resource: resource.id,
        location: d.directive.location,
        lineColumn: lineMap.formatRange(d.directive.location),
        reference: d.directive.reference,
      };
    };

    return discovered.map((d, ordinal): SplicePlan => {
      const target = context.resolvedReferences.get(resource.id, ordinal);
      if (target === undefined) {
        this.report(
          context,
          "unresolved-occurrence",
          `No resolved resource for import "${d.directive.reference}"`,
          locate(d),
        );
        return { discovered: d, dependency: undefined };
      }

      const state = states.get(target);
      if (state?.state === "processed") return { discovered: d, dependency: state.result };

      if (context.resolvedCache.has(target)) {
        this.report(
          context,
          "resolved-dependency-not-yet-processed",
          `Resolved resource "${target}" has not been processed before "${resource.id}"; dependencies must come first`,
          { ...locate(d), target },
        );
      } else {
        this.report(
          context,
          "resolved-dependency-missing",
          `Could not resolve import reference: ${d.directive.reference}`,
          { ...locate(d), target },
        );
      }
      return { discovered: d, dependency: undefined };
    });
  }

  private report(
    context: MergeContext,
    kind: DiagnosticKind,
    message: string,
    details: DiagnosticDetails,
  ): void {
    const diagnostic = createDiagnostic(kind, message, details);
    context.diagnostics.add(diagnostic);
    diagnosticsCounter.add(1, { "treesplice.diagnostic.code": diagnostic.code });
    this.logger.warn("[treesplice] %s %s: %s", diagnostic.code, details.resource ?? "", message);
  }
}

// ── Segment accounting (forward) ────────────────────────────────────────────

function wholeResource(resource: ResourceId, tree: SyntaxTree): SourceSegment {
  return { resource, originalStart: 0, length: tree.textLength };
}

function pushSegment(out: SourceSegment[], resource: ResourceId, start: number, end: number): void {
  if (end > start) out.push({ resource, originalStart: start, length: end - start });
}

/**
 * Output segments of `resource` after splicing, or the reason they could not
 * be computed. Each directive contributes its leading trivia, the
 * dependency's segments (nothing when dropped) and its trailing trivia.
 */
function accountSegments(resource: Resource, plans: readonly SplicePlan[]): SourceSegment[] | string {
  const out: SourceSegment[] = [];
  let cursor = 0;
  for (const [ordinal, plan] of plans.entries()) {
    const bounds = computeSpliceBounds(plan.discovered.node);
    if (!bounds) return `directive ${ordinal} has no usable splice bounds`;
    if (bounds.prefixEnd < cursor) return `directive ${ordinal} overlaps the previous directive`;

    pushSegment(out, resource.id, cursor, bounds.prefixEnd);
    if (plan.dependency) out.push(...plan.dependency.segments);
    pushSegment(out, resource.id, bounds.suffixStart, bounds.fullEnd);
    cursor = bounds.fullEnd;
  }
  pushSegment(out, resource.id, cursor, resource.content.textLength);
  return out;
}

// ── Structural edit (reverse) ───────────────────────────────────────────────

/** Replaces or removes every directive node; edits are queued last-first. */
function applySplices(tree: SyntaxTree, plans: readonly SplicePlan[]): SyntaxTree {
  const editor = tree.createEditor();
  for (let i = plans.length - 1; i >= 0; i--) {
    const { discovered, dependency } = plans[i];
    if (dependency) editor.replace(discovered.node, dependency.tree.root.children);
    else editor.remove(discovered.node);
  }
  return editor.commit();
}
