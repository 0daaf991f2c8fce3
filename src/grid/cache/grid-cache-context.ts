/**
 * Cache context for one grid: one bounded cache per query family.
 *
 * Create it with the grid, pass it to the *Cached queries, clear it when the
 * grid changes. Independent grids use independent contexts. The settings a
 * context is created with also bound the regions its cached queries produce.
 */

import { DEFAULT_GRID_SETTINGS, type GridSettings } from '../grid-settings';
import type { Point3 } from '../point';
import type { HexAxial } from '../hex/hex-coordinates';
import type { TriangleAxial } from '../triangle/triangle-coordinates';
import { LogHandler } from '@/utilities/log-handler';
import { MemoCache, PassthroughCache, type CacheStats, type GridCache } from './grid-cache';

const log = new LogHandler('GridCacheContext');

export interface GridCacheContext {
    readonly enabled: boolean;
    /** Bounding range the cached region queries filter with */
    readonly settings: Readonly<GridSettings>;
    /** Hex edge neighbors in axial form, keyed by axial key */
    readonly hexNeighbors: GridCache<string, readonly HexAxial[]>;
    /** Triangle edge neighbors in axial form, keyed by axial key */
    readonly triangleNeighbors: GridCache<string, readonly TriangleAxial[]>;
    /** Triangle vertex neighbors in axial form, keyed by axial key */
    readonly triangleVertexNeighbors: GridCache<string, readonly TriangleAxial[]>;
    /** Distances, keyed by an order-independent pair key */
    readonly distance: GridCache<string, number>;
    /** World positions, keyed by coordinate key, size and layout */
    readonly world: GridCache<string, Point3>;
    clearAll(): void;
    stats(): GridCacheContextStats;
}

export interface GridCacheContextStats {
    hexNeighbors: CacheStats;
    triangleNeighbors: CacheStats;
    triangleVertexNeighbors: CacheStats;
    distance: CacheStats;
    world: CacheStats;
    total: CacheStats;
}

function createCache<V>(name: string, settings: Readonly<GridSettings>): GridCache<string, V> {
    return settings.cacheEnabled
        ? new MemoCache<V>(name, settings.cacheMaxEntries)
        : new PassthroughCache<V>();
}

function sumStats(parts: CacheStats[]): CacheStats {
    const hits = parts.reduce((sum, s) => sum + s.hits, 0);
    const misses = parts.reduce((sum, s) => sum + s.misses, 0);
    return {
        size: parts.reduce((sum, s) => sum + s.size, 0),
        hits,
        misses,
        hitRate: hits + misses === 0 ? 0 : hits / (hits + misses),
    };
}

export function createGridCacheContext(settings: Readonly<GridSettings> = DEFAULT_GRID_SETTINGS): GridCacheContext {
    const hexNeighbors = createCache<readonly HexAxial[]>('hexNeighbors', settings);
    const triangleNeighbors = createCache<readonly TriangleAxial[]>('triangleNeighbors', settings);
    const triangleVertexNeighbors = createCache<readonly TriangleAxial[]>('triangleVertexNeighbors', settings);
    const distance = createCache<number>('distance', settings);
    const world = createCache<Point3>('world', settings);

    return {
        enabled: settings.cacheEnabled,
        settings,
        hexNeighbors,
        triangleNeighbors,
        triangleVertexNeighbors,
        distance,
        world,
        clearAll(): void {
            hexNeighbors.clear();
            triangleNeighbors.clear();
            triangleVertexNeighbors.clear();
            distance.clear();
            world.clear();
            log.debug('Cleared all grid caches');
        },
        stats(): GridCacheContextStats {
            const parts = {
                hexNeighbors: hexNeighbors.stats(),
                triangleNeighbors: triangleNeighbors.stats(),
                triangleVertexNeighbors: triangleVertexNeighbors.stats(),
                distance: distance.stats(),
                world: world.stats(),
            };
            return { ...parts, total: sumStats(Object.values(parts)) };
        },
    };
}

/** Key for a symmetric pair, identical for (a, b) and (b, a). */
export function pairKey(a: string, b: string): string {
    return a < b ? `${a}|${b}` : `${b}|${a}`;
}
