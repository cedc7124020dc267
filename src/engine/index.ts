export { DiagramParser } from "./parser.js";
export { ReferenceMap } from "./reference-map.js";
export { runPooled, resolveMaxParallel, MAX_PARALLEL_CAP } from "./pool.js";
export type { EnginePhase, FailureReason, ParseResult, ParserOptions, UnitOutcome } from "./types.js";
