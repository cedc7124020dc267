/**
 * Default registry wiring.
 */

import awsResourcesPlugin from "../extensions/aws-resources/index.js";
import type { Logger } from "./logging/logger.js";
import { loadPlugins, type DiagramTfPlugin } from "./plugin-sdk/index.js";
import { HandlerRegistry } from "./registry/registry.js";

export const BUILTIN_PLUGINS: readonly DiagramTfPlugin[] = [awsResourcesPlugin];

/**
 * A fresh registry with the built-in plugins and then `extraPlugins` loaded, so
 * extra plugins can override built-in kinds.
 */
export function createDefaultRegistry(
  options: { logger?: Logger; extraPlugins?: readonly DiagramTfPlugin[] } = {},
): HandlerRegistry {
  const registry = new HandlerRegistry(options.logger?.child("registry"));
  loadPlugins(registry, [...BUILTIN_PLUGINS, ...(options.extraPlugins ?? [])], options.logger?.child("plugins"));
  return registry;
}
