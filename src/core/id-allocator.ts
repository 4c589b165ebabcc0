import type { EntityKind } from '../types/index.js';

/**
 * Per-kind monotonically increasing id counters. Ids are never handed out twice,
 * even after the entity that held them is purged.
 */
export class IdAllocator {
  private counters: Record<EntityKind, number> = { note: 0, folder: 0, tag: 0 };

  nextId(kind: EntityKind): number {
    this.counters[kind] += 1;
    return this.counters[kind];
  }

  /**
   * Raise the counter past an id that was assigned elsewhere (e.g. loaded from disk).
   */
  observe(kind: EntityKind, id: number): void {
    if (id > this.counters[kind]) {
      this.counters[kind] = id;
    }
  }

  peek(kind: EntityKind): number {
    return this.counters[kind];
  }
}
