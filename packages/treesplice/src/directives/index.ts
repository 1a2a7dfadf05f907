export { DirectiveParser, NotBoundError } from "./parser.js";
export type { DiscoveredDirective } from "./parser.js";
export { directiveModel, isBlankReference, stringReferenceExtractor } from "./reference.js";
export type { ReferenceExtractor } from "./reference.js";
export { DirectiveLocationIndex } from "./location-index.js";
