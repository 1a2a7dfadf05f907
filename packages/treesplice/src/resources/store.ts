import type { Resource, ResourceId } from "../types.js";

/** Resources held in memory, keyed by id. Later additions replace earlier ones. */
export class InMemoryResourceStore {
  private readonly resources = new Map<ResourceId, Resource>();

  add(resource: Resource): this {
    this.resources.set(resource.id, resource);
    return this;
  }

  get(id: ResourceId): Resource | undefined {
    return this.resources.get(id);
  }

  has(id: ResourceId): boolean {
    return this.resources.has(id);
  }

  get size(): number {
    return this.resources.size;
  }
}
