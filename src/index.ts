/**
 * diagram-tf public API.
 */

export * from "./diagram/index.js";
export * from "./engine/index.js";
export * from "./registry/index.js";
export * from "./terraform/index.js";
export {
  DiagramTfError,
  DependencyCycleError,
  ReferenceMapError,
  ConfigError,
  diagnosticError,
  diagnosticWarning,
  errorMessage,
  type Diagnostic,
  type DiagnosticSeverity,
  type DiagnosticType,
} from "./errors.js";
export { resolveTiers, topologicalOrder, tierIndex } from "./dependency/resolver.js";
export { resolveConfig, parserConfigSchema, type ParserConfig, type ParserConfigInput } from "./config/config.js";
export { createLogger, createSilentLogger, MemoryTransport, type Logger, type LogLevel } from "./logging/logger.js";
export { loadPlugins, type DiagramTfPlugin, type DiagramTfPluginApi } from "./plugin-sdk/index.js";
export { BUILTIN_PLUGINS, createDefaultRegistry } from "./defaults.js";
export { handleInvocation, type ApiGatewayResponse, type InvocationEvent } from "./lambda/handler.js";
export { VERSION } from "./version.js";
