/**
 * Memoized hex queries. Each takes an optional cache context and returns
 * exactly what the plain query returns; without a context it recomputes.
 */

import { DEFAULT_GRID_SETTINGS } from '../grid-settings';
import { checkSize, gridSuccess, type GridResult } from '../errors';
import type { Point3 } from '../point';
import { memoize } from '../cache/grid-cache';
import { pairKey, type GridCacheContext } from '../cache/grid-cache-context';
import { hexKey, type HexCoordinate } from './hex-coordinates';
import { fromHexAxialLike, toHexAxial } from './hex-conversion';
import { axialToWorldUnchecked, getHexLayout, type HexLayout } from './hex-layout';
import { getHexNeighbors, getHexRange, hexDistance } from './hex-regions';

export function getHexNeighborsCached<T extends HexCoordinate>(coord: T, context?: GridCacheContext): T[] {
    if (!context) {
        return getHexNeighbors(coord);
    }
    const axial = toHexAxial(coord);
    const neighbors = memoize(context.hexNeighbors, hexKey(axial), () => getHexNeighbors(axial));
    return neighbors.map(n => fromHexAxialLike(n, coord));
}

export function hexDistanceCached(a: HexCoordinate, b: HexCoordinate, context?: GridCacheContext): number {
    if (!context) {
        return hexDistance(a, b);
    }
    const key = pairKey(hexKey(toHexAxial(a)), hexKey(toHexAxial(b)));
    return memoize(context.distance, key, () => hexDistance(a, b));
}

export function hexToWorldCached(
    coord: HexCoordinate,
    size: number = DEFAULT_GRID_SETTINGS.defaultSize,
    layout: HexLayout = getHexLayout(),
    context?: GridCacheContext,
): GridResult<Point3> {
    const checked = checkSize(size);
    if (!checked.success) return checked;

    const axial = toHexAxial(coord);
    if (!context) {
        return gridSuccess(axialToWorldUnchecked(axial, size, layout));
    }
    const key = `${hexKey(axial)}@${size}/${layout.name}`;
    return gridSuccess(memoize(context.world, key, () => axialToWorldUnchecked(axial, size, layout)));
}

/**
 * Pre-populate neighbors and world positions for every cell within `radius`
 * that lies inside the context's bounding range. Returns the number of cells.
 */
export function warmupHexCache(
    context: GridCacheContext,
    center: HexCoordinate,
    radius: number,
    size: number = DEFAULT_GRID_SETTINGS.defaultSize,
    layout: HexLayout = getHexLayout(),
): GridResult<number> {
    const checked = checkSize(size);
    if (!checked.success) return checked;

    const range = getHexRange(toHexAxial(center), radius, { settings: context.settings });
    if (!range.success) return range;

    for (const cell of range.value) {
        getHexNeighborsCached(cell, context);
        hexToWorldCached(cell, size, layout, context);
    }
    return gridSuccess(range.value.length);
}
