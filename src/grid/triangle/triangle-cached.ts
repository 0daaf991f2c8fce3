/**
 * Memoized triangle queries, mirroring hex-cached.
 */

import { gridSuccess, type GridResult } from '../errors';
import { memoize } from '../cache/grid-cache';
import { pairKey, type GridCacheContext } from '../cache/grid-cache-context';
import { triangleKey, type TriangleCoordinate } from './triangle-coordinates';
import { fromTriangleAxialLike, toTriangleAxial } from './triangle-conversion';
import { getTriangleNeighbors, getTriangleRange, getTriangleVertexNeighbors, triangleDistance } from './triangle-regions';

export function getTriangleNeighborsCached<T extends TriangleCoordinate>(coord: T, context?: GridCacheContext): T[] {
    if (!context) {
        return getTriangleNeighbors(coord);
    }
    const axial = toTriangleAxial(coord);
    const neighbors = memoize(context.triangleNeighbors, triangleKey(axial), () => getTriangleNeighbors(axial));
    return neighbors.map(n => fromTriangleAxialLike(n, coord));
}

/** Filtered by the context's bounding range, or the default one without a context. */
export function getTriangleVertexNeighborsCached<T extends TriangleCoordinate>(coord: T, context?: GridCacheContext): T[] {
    if (!context) {
        return getTriangleVertexNeighbors(coord);
    }
    const axial = toTriangleAxial(coord);
    const options = { settings: context.settings };
    const neighbors = memoize(context.triangleVertexNeighbors, triangleKey(axial), () => getTriangleVertexNeighbors(axial, options));
    return neighbors.map(n => fromTriangleAxialLike(n, coord));
}

export function triangleDistanceCached(a: TriangleCoordinate, b: TriangleCoordinate, context?: GridCacheContext): number {
    if (!context) {
        return triangleDistance(a, b);
    }
    const key = pairKey(triangleKey(toTriangleAxial(a)), triangleKey(toTriangleAxial(b)));
    return memoize(context.distance, key, () => triangleDistance(a, b));
}

/**
 * Pre-populate edge and vertex neighbors for every cell within `radius` that
 * lies inside the context's bounding range. Returns the number of cells.
 */
export function warmupTriangleCache(context: GridCacheContext, center: TriangleCoordinate, radius: number): GridResult<number> {
    const range = getTriangleRange(toTriangleAxial(center), radius, { settings: context.settings });
    if (!range.success) return range;

    for (const cell of range.value) {
        getTriangleNeighborsCached(cell, context);
        getTriangleVertexNeighborsCached(cell, context);
    }
    return gridSuccess(range.value.length);
}
