import { inspect } from "node:util";

/**
 * Serialises arbitrary data into a deterministic string so cache keys remain
 * stable regardless of property insertion order.
 */
function serialiseVariant(value: unknown): string {
  if (value === undefined) {
    return "undefined";
  }
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((entry) => serialiseVariant(entry)).join(",")}]`;
  }
  const entries = Object.entries(value)
    .filter(([, entryValue]) => entryValue !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, entryValue]) => `${JSON.stringify(key)}:${serialiseVariant(entryValue)}`);
  return `{${entries.join(",")}}`;
}

interface CacheEntry {
  readonly value: unknown;
}

export interface GraphComputationCacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
}

/**
 * Small LRU cache memoising expensive graph metrics (centrality, all-pairs
 * distances). Keys embed the content fingerprint of the graph, so a rebuilt
 * or mutated graph never hits an entry computed for another topology.
 */
export class GraphComputationCache {
  private readonly entries = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(private readonly capacity = 64) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`GraphComputationCache capacity must be a positive integer (received ${inspect(capacity)})`);
    }
  }

  private composeKey(fingerprint: string, operation: string, variant: unknown): string {
    return `${fingerprint}::${operation}::${serialiseVariant(variant)}`;
  }

  get<T>(fingerprint: string, operation: string, variant: unknown): T | undefined {
    const key = this.composeKey(fingerprint, operation, variant);
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses += 1;
      return undefined;
    }
    // Refresh the entry position to preserve the LRU ordering.
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits += 1;
    return entry.value as T;
  }

  set<T>(fingerprint: string, operation: string, variant: unknown, value: T): void {
    const key = this.composeKey(fingerprint, operation, variant);
    this.entries.delete(key);
    this.entries.set(key, { value });
    if (this.entries.size > this.capacity) {
      const oldestKey = this.entries.keys().next().value;
      if (oldestKey !== undefined) {
        this.entries.delete(oldestKey);
        this.evictions += 1;
      }
    }
  }

  /** Returns the cached value or computes and stores it. */
  remember<T>(fingerprint: string, operation: string, variant: unknown, compute: () => T): T {
    const cached = this.get<T>(fingerprint, operation, variant);
    if (cached !== undefined) {
      return cached;
    }
    const value = compute();
    this.set(fingerprint, operation, variant, value);
    return value;
  }

  stats(): GraphComputationCacheStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }
}
