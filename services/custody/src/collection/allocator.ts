/**
 * Object allocation
 *
 * Globally unique identifiers for collections, items and capabilities come
 * from the host. UuidAllocator is the default; SequentialAllocator gives
 * deterministic ids for replays.
 */

import * as crypto from "crypto";

export type ObjectKind = "collection" | "item" | "capability";

export interface ObjectAllocator {
  allocate(kind: ObjectKind): string;
}

export class UuidAllocator implements ObjectAllocator {
  allocate(_kind: ObjectKind): string {
    return crypto.randomUUID();
  }
}

export class SequentialAllocator implements ObjectAllocator {
  private readonly counters: Record<ObjectKind, number> = {
    collection: 0,
    item: 0,
    capability: 0,
  };

  allocate(kind: ObjectKind): string {
    this.counters[kind] += 1;
    return `${kind}-${this.counters[kind]}`;
  }
}
