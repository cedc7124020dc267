export { HandlerRegistry, type RegistryStatistics } from "./registry.js";
export type { ReferenceLookup, ResourceHandler, ValidationOutcome } from "./types.js";
