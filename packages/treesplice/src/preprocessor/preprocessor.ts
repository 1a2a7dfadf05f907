import { SpanStatusCode } from "@opentelemetry/api";
import {
  createDiagnostic,
  DiagnosticCollection,
  type Diagnostic,
  type DiagnosticDetails,
  type DiagnosticKind,
} from "../diagnostics/diagnostic.js";
import { DirectiveParser } from "../directives/parser.js";
import type { ReferenceExtractor } from "../directives/reference.js";
import { silentLogger, type Logger } from "../logger.js";
import { ResolvedReferenceTable } from "../merge/context.js";
import { MergeEngine } from "../merge/merge-engine.js";
import { SourceMapBuilder, type SourceMap } from "../merge/source-map.js";
import type { ResourceResolver } from "../resources/resolver.js";
import type { SyntaxTree } from "../syntax/index.js";
import { diagnosticsCounter, otelTracer } from "../telemetry.js";
import { LineMap } from "../text/line-map.js";
import type { Directive, ResolvedResource, Resource, ResourceId } from "../types.js";
import { resolvePreprocessorOptions, type PreprocessorOptions, type ResolvedPreprocessorOptions } from "./options.js";

export type PreprocessorConfig = {
  /** Schema kind of directive nodes */
  kind: string;
  extractor: ReferenceExtractor;
  resolver: ResourceResolver;
  logger?: Logger;
};

export type PreprocessResult = {
  content: SyntaxTree;
  sourceMap: SourceMap;
  diagnostics: Diagnostic[];
  success: boolean;
  /** Every loaded resource in dependency order, root last */
  resources: Resource[];
};

/** Mutable state of one `process` call */
type Run = {
  options: ResolvedPreprocessorOptions;
  diagnostics: DiagnosticCollection;
  references: ResolvedReferenceTable;
  /** Ids on the current include chain, root first */
  stack: ResourceId[];
  /** Post-order: dependencies before their dependents */
  ordered: ResolvedResource[];
  /** Finished resources → length of the longest include chain below them */
  heights: Map<ResourceId, number>;
  stopped: boolean;
};

/**
 * Resolves the include graph below a root resource and merges it.
 *
 * ```ts
 * const preprocessor = new Preprocessor({ kind: "import", extractor, resolver });
 * const { content, sourceMap } = await preprocessor.process(root);
 * ```
 */
export class Preprocessor {
  private readonly parser: DirectiveParser;
  private readonly logger: Logger;

  constructor(private readonly config: PreprocessorConfig) {
    this.parser = new DirectiveParser(config.kind, config.extractor);
    this.logger = config.logger ?? silentLogger;
  }

  async process(root: Resource, options: PreprocessorOptions = {}): Promise<PreprocessResult> {
    const resolved = resolvePreprocessorOptions(options);
    return otelTracer.startActiveSpan("treesplice.preprocess", async (span) => {
      try {
        const result = await this.run(root, resolved);
        span.setAttribute("treesplice.resources", result.resources.length);
        span.setAttribute("treesplice.diagnostics", result.diagnostics.length);
        if (!result.success) {
          span.setStatus({ code: SpanStatusCode.ERROR, message: "preprocessing reported errors" });
        }
        this.logger.info(
          "[treesplice] preprocessed %s: %d resources, success=%s",
          root.id,
          result.resources.length,
          result.success,
        );
        return result;
      } catch (err) {
        if (err instanceof Error) span.recordException(err);
        span.setStatus({ code: SpanStatusCode.ERROR, message: String(err) });
        throw err;
      } finally {
        span.end();
      }
    });
  }

  private async run(root: Resource, options: ResolvedPreprocessorOptions): Promise<PreprocessResult> {
    // An unbound root is a caller error
    this.parser.parse(root.content, root.id);

    const run: Run = {
      options,
      diagnostics: new DiagnosticCollection(),
      references: new ResolvedReferenceTable(),
      stack: [],
      ordered: [],
      heights: new Map(),
      stopped: false,
    };
    await this.visit(root, 0, run);

    const resources = run.ordered.map((entry) => entry.resource);
    if (run.diagnostics.hasErrors) {
      const identity = new SourceMapBuilder();
      identity.addSegment(root.id, 0, 0, root.content.textLength);
      return {
        content: root.content,
        sourceMap: identity.build(),
        diagnostics: run.diagnostics.toArray(),
        success: false,
        resources,
      };
    }

    const engine = new MergeEngine(this.config.kind, this.config.extractor, {
      logger: this.logger,
      signal: options.signal,
    });
    const merged = engine.merge(run.ordered, {
      diagnostics: run.diagnostics,
      resolvedReferences: run.references,
      resolvedCache: new Map(resources.map((r) => [r.id, r])),
      sourceMapBuilder: new SourceMapBuilder(),
    });
    return {
      content: merged.tree,
      sourceMap: merged.sourceMap,
      diagnostics: merged.diagnostics,
      success: merged.success,
      resources,
    };
  }

  // ── Graph resolution ──────────────────────────────────────────────────────

  /** Depth-first: each resource is appended after all of its dependencies. */
  private async visit(resource: Resource, depth: number, run: Run): Promise<void> {
    run.stack.push(resource.id);
    let height = 0;
    const directives = resource.content.hasSchema ? this.parser.parse(resource.content, resource.id) : [];

    for (const [ordinal, directive] of directives.entries()) {
      if (run.stopped) break;
      run.options.signal?.throwIfAborted();

      const result = await this.config.resolver.resolve(directive.reference, resource, run.options.signal);
      if (!result.ok) {
        this.reportResolutionFailure(result.diagnostic, resource, directive, run);
        continue;
      }

      const dependency = result.resource;
      const cycleStart = run.stack.indexOf(dependency.id);
      if (cycleStart !== -1) {
        const cycle = [...run.stack.slice(cycleStart), dependency.id];
        this.report(run, "circular-dependency", `Circular dependency detected: ${cycle.join(" -> ")}`, {
          ...directiveDetails(resource, directive),
          target: dependency.id,
          cycle,
        });
        continue;
      }

      // A resource reached again must still fit below this import site
      const reached = run.heights.get(dependency.id) ?? 0;
      if (depth + 1 + reached > run.options.maxIncludeDepth) {
        this.report(
          run,
          "max-depth-exceeded",
          `Maximum include depth of ${run.options.maxIncludeDepth} exceeded including "${dependency.id}"`,
          { ...directiveDetails(resource, directive), target: dependency.id },
        );
        continue;
      }
      if (!run.heights.has(dependency.id)) await this.visit(dependency, depth + 1, run);
      height = Math.max(height, 1 + (run.heights.get(dependency.id) ?? 0));
      run.references.set(resource.id, ordinal, dependency.id);
    }

    run.stack.pop();
    run.heights.set(resource.id, height);
    run.ordered.push({ resource, directives });
  }

  /** Fills in the import site when the resolver could not */
  private reportResolutionFailure(diagnostic: Diagnostic, resource: Resource, directive: Directive, run: Run): void {
    const filled: Diagnostic = diagnostic.location
      ? diagnostic
      : { ...diagnostic, ...directiveDetails(resource, directive) };
    this.add(run, filled);
  }

  private report(run: Run, kind: DiagnosticKind, message: string, details: DiagnosticDetails): void {
    this.add(run, createDiagnostic(kind, message, details));
  }

  private add(run: Run, diagnostic: Diagnostic): void {
    run.diagnostics.add(diagnostic);
    diagnosticsCounter.add(1, { "treesplice.diagnostic.code": diagnostic.code });
    this.logger.warn("[treesplice] %s %s: %s", diagnostic.code, diagnostic.resource ?? "", diagnostic.message);
    if (!run.options.continueOnError && diagnostic.severity === "error") run.stopped = true;
  }
}

function directiveDetails(resource: Resource, directive: Directive): DiagnosticDetails {
  return {
    resource: resource.id,
    location: directive.location,
    lineColumn: LineMap.fromTree(resource.content).formatRange(directive.location),
    reference: directive.reference,
  };
}
