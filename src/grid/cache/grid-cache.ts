/**
 * Memoization caches for grid queries.
 *
 * A cache is owned by one grid and passed explicitly to the queries that
 * opt in; nothing here is global. Caches are bounded: once full they stop
 * inserting until cleared. Results never depend on whether a cache is used.
 *
 * Single writer: one grid-update pass at a time mutates a context.
 */

import { LogHandler } from '@/utilities/log-handler';

export type CacheLookup<V> =
    | { found: true; value: V }
    | { found: false };

export interface CacheStats {
    size: number;
    hits: number;
    misses: number;
    /** hits / (hits + misses), 0 before the first lookup */
    hitRate: number;
}

export interface GridCache<K, V> {
    tryGet(key: K): CacheLookup<V>;
    set(key: K, value: V): void;
    clear(): void;
    stats(): CacheStats;
}

const log = new LogHandler('GridCache');

/** String-keyed bounded cache. */
export class MemoCache<V> implements GridCache<string, V> {
    private readonly entries = new Map<string, V>();
    private hits = 0;
    private misses = 0;
    private fullReported = false;
    private readonly logger: LogHandler;

    constructor(
        public readonly name: string,
        private readonly maxEntries: number,
    ) {
        this.logger = log.child(name);
    }

    tryGet(key: string): CacheLookup<V> {
        const value = this.entries.get(key);
        if (value !== undefined) {
            this.hits++;
            return { found: true, value };
        }
        this.misses++;
        return { found: false };
    }

    set(key: string, value: V): void {
        if (this.entries.has(key)) {
            this.entries.set(key, value);
            return;
        }
        if (this.entries.size >= this.maxEntries) {
            if (!this.fullReported) {
                this.fullReported = true;
                this.logger.warn(`Reached ${this.maxEntries} entries, further results are not stored until cleared`);
            }
            return;
        }
        this.entries.set(key, value);
    }

    clear(): void {
        this.entries.clear();
        this.hits = 0;
        this.misses = 0;
        this.fullReported = false;
    }

    stats(): CacheStats {
        const lookups = this.hits + this.misses;
        return {
            size: this.entries.size,
            hits: this.hits,
            misses: this.misses,
            hitRate: lookups === 0 ? 0 : this.hits / lookups,
        };
    }
}

/** Cache that never stores; used when caching is disabled. */
export class PassthroughCache<V> implements GridCache<string, V> {
    private misses = 0;

    tryGet(_key: string): CacheLookup<V> {
        this.misses++;
        return { found: false };
    }

    set(_key: string, _value: V): void {}

    clear(): void {
        this.misses = 0;
    }

    stats(): CacheStats {
        return { size: 0, hits: 0, misses: this.misses, hitRate: 0 };
    }
}

/** Look up `key`, computing and storing the value on a miss. */
export function memoize<V>(cache: GridCache<string, V>, key: string, compute: () => V): V {
    const cached = cache.tryGet(key);
    if (cached.found) {
        return cached.value;
    }
    const value = compute();
    cache.set(key, value);
    return value;
}
