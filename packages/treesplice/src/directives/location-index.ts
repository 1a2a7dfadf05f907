import type { ResourceId, TextRange } from "../types.js";
import { isBlankReference } from "./reference.js";

/**
 * Directive locations keyed by importing resource and (trimmed) reference.
 *
 * Resolvers dequeue the next location for a reference so a resolution
 * failure can be pinned to the import site that caused it.
 */
export class DirectiveLocationIndex {
  private readonly locations = new Map<ResourceId, Map<string, TextRange[]>>();

  add(resource: ResourceId, reference: string, location: TextRange): void {
    if (isBlankReference(reference)) return;
    let byReference = this.locations.get(resource);
    if (!byReference) {
      byReference = new Map();
      this.locations.set(resource, byReference);
    }
    const key = reference.trim();
    const queue = byReference.get(key);
    if (queue) queue.push(location);
    else byReference.set(key, [location]);
  }

  /** Next location recorded for the pair, or undefined when none is left */
  dequeue(resource: ResourceId, reference: string): TextRange | undefined {
    if (isBlankReference(reference)) return undefined;
    return this.locations.get(resource)?.get(reference.trim())?.shift();
  }
}
