/**
 * diagram-tf plugin SDK
 *
 * Everything a handler pack needs: the plugin shape, the handler contract, diagram
 * accessors, diagnostics and the HCL writer.
 */

import { createSilentLogger, type Logger } from "../logging/logger.js";
import type { HandlerRegistry } from "../registry/registry.js";
import type { ResourceHandler } from "../registry/types.js";

export type DiagramTfPluginApi = {
  /** Register a handler under its own kind; replaces an earlier one for that kind */
  registerHandler(handler: ResourceHandler): void;
  logger?: Logger;
};

export type DiagramTfPlugin = {
  id: string;
  name: string;
  register(api: DiagramTfPluginApi): void;
};

/**
 * Load plugins into a registry in order; later plugins override earlier kinds.
 */
export function loadPlugins(
  registry: HandlerRegistry,
  plugins: readonly DiagramTfPlugin[],
  logger: Logger = createSilentLogger("plugins"),
): void {
  for (const plugin of plugins) {
    const pluginLogger = logger.child(plugin.id);
    const before = registry.list().length;
    plugin.register({
      registerHandler: (handler) => registry.registerHandler(handler),
      logger: pluginLogger,
    });
    logger.debug(`Loaded plugin: ${plugin.name}`, { id: plugin.id, newKinds: registry.list().length - before });
  }
}

export type { ReferenceLookup, ResourceHandler, ValidationOutcome } from "../registry/types.js";
export type { Diagram, DiagramEdge, DiagramNode, EdgeKind, JsonValue, Properties } from "../diagram/types.js";
export {
  getBoolean,
  getInteger,
  getList,
  getRecord,
  getString,
  getStringList,
  getStringRecord,
  hasProperty,
  isJsonArray,
  isJsonObject,
  type JsonObject,
} from "../diagram/properties.js";
export { findNode, incomingEdges, outgoingEdges, parentNodes } from "../diagram/graph.js";
export { diagnosticError, diagnosticWarning, type Diagnostic } from "../errors.js";
export {
  HclBlock,
  expr,
  reference,
  renderBlocks,
  sanitizeName,
  type HclValue,
} from "../terraform/hcl.js";
export type { Logger } from "../logging/logger.js";
