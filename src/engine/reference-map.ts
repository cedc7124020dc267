/**
 * Reference map — symbolic addresses of resources generated in completed tiers.
 */

import { ReferenceMapError } from "../errors.js";
import type { ReferenceLookup } from "../registry/types.js";

/**
 * Append-only map from node id to Terraform address. Only the engine writes to it,
 * once per tier; handlers receive it as a {@link ReferenceLookup}.
 */
export class ReferenceMap implements ReferenceLookup {
  private addresses = new Map<string, string>();

  get(nodeId: string): string | undefined {
    return this.addresses.get(nodeId);
  }

  has(nodeId: string): boolean {
    return this.addresses.has(nodeId);
  }

  get size(): number {
    return this.addresses.size;
  }

  /**
   * Add the addresses of one finished tier.
   *
   * @throws ReferenceMapError if any id already has an address
   */
  extend(entries: Iterable<readonly [string, string]>): void {
    const batch = [...entries];
    for (const [nodeId] of batch) {
      if (this.addresses.has(nodeId)) {
        throw new ReferenceMapError(`node ${nodeId} already has address ${this.addresses.get(nodeId)}`);
      }
    }
    for (const [nodeId, address] of batch) {
      this.addresses.set(nodeId, address);
    }
  }

  /**
   * Entries in insertion (tier, then declaration) order.
   */
  entries(): Array<[string, string]> {
    return [...this.addresses.entries()];
  }

  /**
   * Read-only view that does not expose `extend`.
   */
  view(): ReferenceLookup {
    const addresses = this.addresses;
    return {
      get: (nodeId) => addresses.get(nodeId),
      has: (nodeId) => addresses.has(nodeId),
      get size() {
        return addresses.size;
      },
    };
  }
}
