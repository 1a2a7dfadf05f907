export { InMemoryResourceStore } from "./store.js";
export { resolveResourceId } from "./path-resolver.js";
export { InMemoryResourceResolver } from "./resolver.js";
export type { ResourceResolver, ResolutionResult } from "./resolver.js";
