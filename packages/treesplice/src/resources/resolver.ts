import { createDiagnostic, type Diagnostic } from "../diagnostics/diagnostic.js";
import type { DirectiveLocationIndex } from "../directives/location-index.js";
import { LineMap } from "../text/line-map.js";
import type { Resource } from "../types.js";
import { resolveResourceId } from "./path-resolver.js";
import type { InMemoryResourceStore } from "./store.js";

export type ResolutionResult =
  | { ok: true; resource: Resource }
  | { ok: false; diagnostic: Diagnostic };

/**
 * Maps a directive's reference text, seen from `context`, to a resource.
 *
 * The returned resource's id is canonical: different reference spellings
 * of one document must come back with the same id.
 */
export interface ResourceResolver {
  resolve(reference: string, context: Resource | undefined, signal?: AbortSignal): Promise<ResolutionResult>;
}

/**
 * Resolves references with {@link resolveResourceId} against an in-memory
 * store. With a location index, failures are pinned to the import site.
 */
export class InMemoryResourceResolver implements ResourceResolver {
  constructor(
    private readonly store: InMemoryResourceStore,
    private readonly locationIndex?: DirectiveLocationIndex,
  ) {}

  async resolve(reference: string, context: Resource | undefined, signal?: AbortSignal): Promise<ResolutionResult> {
    signal?.throwIfAborted();

    const id = resolveResourceId(reference, context?.id);
    const resource = this.store.get(id);
    if (resource) return { ok: true, resource };

    const location = context ? this.locationIndex?.dequeue(context.id, reference) : undefined;
    const lineColumn = context && location ? LineMap.fromTree(context.content).formatRange(location) : undefined;
    return {
      ok: false,
      diagnostic: createDiagnostic(
        "resolution-failed",
        `Could not resolve import reference: ${reference} (not found as "${id}")`,
        { resource: context?.id, location, lineColumn, reference, target: id },
      ),
    };
  }
}
