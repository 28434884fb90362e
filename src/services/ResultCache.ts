/**
 * Result Cache
 *
 * Key-value store for formatted query results, keyed by entity kind,
 * location and granularity. Entries are replaced whole, never merged.
 */

import type { Granularity } from '../types.js';

export type CacheKind = 'locations' | 'stats' | 'info' | 'noise';

export interface CacheKey {
  kind: CacheKind;
  locationId?: string;
  granularity?: Granularity;
}

/**
 * Single-writer cache owned by the data manager
 */
export class ResultCache<V> {
  private readonly entries = new Map<string, { key: CacheKey; value: V }>();

  get(key: CacheKey): V | undefined {
    return this.entries.get(serialize(key))?.value;
  }

  has(key: CacheKey): boolean {
    return this.entries.has(serialize(key));
  }

  /**
   * Replace the entry for the key
   */
  set(key: CacheKey, value: V): void {
    this.entries.set(serialize(key), { key, value });
  }

  /**
   * Drop every entry matching the given parts of a key; omitted parts match anything
   *
   * @returns Number of entries removed
   *
   * @example
   * cache.invalidate({ locationId: '42' }) // everything cached for location 42
   */
  invalidate(match: Partial<CacheKey> = {}): number {
    let removed = 0;
    for (const [serialized, entry] of this.entries) {
      if (
        (match.kind === undefined || entry.key.kind === match.kind) &&
        (match.locationId === undefined || entry.key.locationId === match.locationId) &&
        (match.granularity === undefined || entry.key.granularity === match.granularity)
      ) {
        this.entries.delete(serialized);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}

function serialize(key: CacheKey): string {
  return JSON.stringify([key.kind, key.locationId ?? null, key.granularity ?? null]);
}
