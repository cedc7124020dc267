export * from "./types.js";
export * from "./properties.js";
export * from "./graph.js";
export * from "./schema.js";
export { validateDiagram } from "./validate.js";
