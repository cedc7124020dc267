/**
 * Resource Handler Registry
 *
 * Maps resource kinds to the handlers that validate and generate them. One registry
 * is built per process (or per test) and handed to the parser; there is no global
 * instance.
 */

import { createSilentLogger, type Logger } from "../logging/logger.js";
import type { ResourceHandler } from "./types.js";

export type RegistryStatistics = {
  totalKinds: number;
  overrides: number;
};

export class HandlerRegistry {
  private handlers: Map<string, ResourceHandler> = new Map();
  private overrides = 0;
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createSilentLogger("registry");
  }

  /**
   * Register a handler for `kind`. A later registration replaces an earlier one,
   * which is how built-in handlers are overridden.
   */
  register(kind: string, handler: ResourceHandler): void {
    if (kind === "") {
      throw new Error("Resource kind must not be empty");
    }
    if (this.handlers.has(kind)) {
      this.overrides++;
      this.logger.debug(`Overriding handler for kind: ${kind}`);
    } else {
      this.logger.debug(`Registered handler for kind: ${kind}`, {
        terraformType: handler.terraformType,
      });
    }
    this.handlers.set(kind, handler);
  }

  /**
   * Register a handler under its own `kind`.
   */
  registerHandler(handler: ResourceHandler): void {
    this.register(handler.kind, handler);
  }

  get(kind: string): ResourceHandler | undefined {
    return this.handlers.get(kind);
  }

  has(kind: string): boolean {
    return this.handlers.has(kind);
  }

  /**
   * Registered kinds, sorted.
   */
  list(): string[] {
    return [...this.handlers.keys()].sort();
  }

  getStatistics(): RegistryStatistics {
    return { totalKinds: this.handlers.size, overrides: this.overrides };
  }
}
