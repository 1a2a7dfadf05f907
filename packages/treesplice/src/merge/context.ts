import { DiagnosticCollection } from "../diagnostics/diagnostic.js";
import type { Resource, ResolvedResource, ResourceId } from "../types.js";
import { SourceMapBuilder } from "./source-map.js";

/**
 * Per-occurrence resolution results: (resource, directive ordinal) →
 * canonical id of the resource that occurrence includes.
 */
export class ResolvedReferenceTable {
  private readonly entries = new Map<ResourceId, Map<number, ResourceId>>();

  set(resource: ResourceId, ordinal: number, target: ResourceId): this {
    let byOrdinal = this.entries.get(resource);
    if (!byOrdinal) {
      byOrdinal = new Map();
      this.entries.set(resource, byOrdinal);
    }
    byOrdinal.set(ordinal, target);
    return this;
  }

  get(resource: ResourceId, ordinal: number): ResourceId | undefined {
    return this.entries.get(resource)?.get(ordinal);
  }

  has(resource: ResourceId, ordinal: number): boolean {
    return this.get(resource, ordinal) !== undefined;
  }

  get size(): number {
    let total = 0;
    for (const byOrdinal of this.entries.values()) total += byOrdinal.size;
    return total;
  }
}

/** State shared by one merge call; created by the caller, appended to by the engine. */
export type MergeContext = {
  readonly diagnostics: DiagnosticCollection;
  readonly resolvedReferences: ResolvedReferenceTable;
  /** Every resource the resolver produced, processed or not */
  readonly resolvedCache: ReadonlyMap<ResourceId, Resource>;
  readonly sourceMapBuilder: SourceMapBuilder;
};

/**
 * Context for `orderedResources`. Without an explicit table every directive
 * resolves to the id spelled by its reference text.
 */
export function createMergeContext(
  orderedResources: readonly ResolvedResource[],
  resolvedReferences?: ResolvedReferenceTable,
): MergeContext {
  const resolvedCache = new Map<ResourceId, Resource>();
  for (const { resource } of orderedResources) resolvedCache.set(resource.id, resource);

  return {
    diagnostics: new DiagnosticCollection(),
    resolvedReferences: resolvedReferences ?? referencesByText(orderedResources),
    resolvedCache,
    sourceMapBuilder: new SourceMapBuilder(),
  };
}

function referencesByText(orderedResources: readonly ResolvedResource[]): ResolvedReferenceTable {
  const table = new ResolvedReferenceTable();
  for (const { resource, directives } of orderedResources) {
    directives.forEach((d, ordinal) => table.set(resource.id, ordinal, d.reference));
  }
  return table;
}
