/**
 * Triangle adjacency, distance and region queries.
 *
 * Distance is Chebyshev on the cube embedding, the same metric as the hex
 * grid. Edge neighbors are always at distance 1; the converse does not
 * hold, since a cell straight above an upward apex is at distance 1 but
 * shares only a corner.
 */

import { DEFAULT_GRID_SETTINGS, type GridSettings } from '../grid-settings';
import { checkDirection, checkRadius, checkSize, gridFailed, gridSuccess, type GridResult } from '../errors';
import { roundHexCube } from '../hex/hex-layout';
import {
    isTriangleUpward,
    isValidTriangle,
    triangleAxial,
    triangleCube,
    triangleKey,
    triangleOffset,
    type TriangleAxial,
    type TriangleCoordinate,
    type TriangleOffset,
} from './triangle-coordinates';
import { fromTriangleAxialLike, toTriangleAxial, toTriangleCube, toTriangleOffset, triangleCubeToAxial } from './triangle-conversion';
import { ETriangleEdge, NUMBER_OF_TRIANGLE_EDGES, triangleEdgeDeltas } from './triangle-directions';

export interface TriangleRegionOptions {
    settings?: Readonly<GridSettings>;
}

// ═══════════════════════════════════════════════════════════════════════════
// NEIGHBORS
// ═══════════════════════════════════════════════════════════════════════════

/** The three edge-adjacent cells, ordered by ETriangleEdge; each has the opposite orientation. */
export function getTriangleNeighbors<T extends TriangleCoordinate>(coord: T): T[] {
    const { q, r } = toTriangleAxial(coord);
    return triangleEdgeDeltas(isTriangleUpward(coord)).map(
        ([dq, dr]) => fromTriangleAxialLike(triangleAxial(q + dq, r + dr), coord),
    );
}

/** Neighbor across one edge; INVALID_ARGUMENT outside 0-2. */
export function getTriangleNeighbor<T extends TriangleCoordinate>(coord: T, edge: ETriangleEdge | number): GridResult<T> {
    const checked = checkDirection(edge, NUMBER_OF_TRIANGLE_EDGES);
    if (!checked.success) return checked;
    const { q, r } = toTriangleAxial(coord);
    const [dq, dr] = triangleEdgeDeltas(isTriangleUpward(coord))[checked.value];
    return gridSuccess(fromTriangleAxialLike(triangleAxial(q + dq, r + dr), coord));
}

/**
 * Corners of a cell on the vertex lattice, in half-side units along x and
 * row units along y. Vertex (vx, vy) is shared by cells vx-1..vx+1 in rows
 * vy-1 and vy.
 */
function cornerVertices(axial: TriangleAxial): Array<[number, number]> {
    const { q, r } = axial;
    return isTriangleUpward(axial)
        ? [[q - 1, r], [q + 1, r], [q, r + 1]]
        : [[q - 1, r + 1], [q + 1, r + 1], [q, r]];
}

/**
 * Every cell sharing at least one corner with `coord` (twelve in open space),
 * including the three edge neighbors. Cells outside the bounding range are
 * dropped.
 */
export function getTriangleVertexNeighbors<T extends TriangleCoordinate>(coord: T, options: TriangleRegionOptions = {}): T[] {
    const settings = options.settings ?? DEFAULT_GRID_SETTINGS;
    const self = toTriangleAxial(coord);
    const seen = new Set<string>([triangleKey(self)]);
    const result: T[] = [];

    for (const [vx, vy] of cornerVertices(self)) {
        for (let row = vy - 1; row <= vy; row++) {
            for (let q = vx - 1; q <= vx + 1; q++) {
                const cell = triangleAxial(q, row);
                const key = triangleKey(cell);
                if (seen.has(key)) continue;
                seen.add(key);
                if (isValidTriangle(cell, settings)) {
                    result.push(fromTriangleAxialLike(cell, coord));
                }
            }
        }
    }

    return result;
}

export function areTrianglesAdjacent(a: TriangleCoordinate, b: TriangleCoordinate): boolean {
    const target = toTriangleAxial(b);
    return getTriangleNeighbors(toTriangleAxial(a)).some(n => n.q === target.q && n.r === target.r);
}

// ═══════════════════════════════════════════════════════════════════════════
// DISTANCE
// ═══════════════════════════════════════════════════════════════════════════

export function triangleDistance(a: TriangleCoordinate, b: TriangleCoordinate): number {
    const ca = toTriangleCube(a);
    const cb = toTriangleCube(b);
    return Math.max(
        Math.abs(ca.x - cb.x),
        Math.abs(ca.y - cb.y),
        Math.abs(ca.z - cb.z),
    );
}

// ═══════════════════════════════════════════════════════════════════════════
// RANGE / RING / LINE
// ═══════════════════════════════════════════════════════════════════════════

/** Every cell within `radius` of the center. */
export function getTriangleRange<T extends TriangleCoordinate>(center: T, radius: number, options: TriangleRegionOptions = {}): GridResult<T[]> {
    const checked = checkRadius(radius);
    if (!checked.success) return checked;

    const settings = options.settings ?? DEFAULT_GRID_SETTINGS;
    const c = toTriangleCube(center);
    const result: T[] = [];

    for (let dx = -radius; dx <= radius; dx++) {
        const dyMin = Math.max(-radius, -dx - radius);
        const dyMax = Math.min(radius, -dx + radius);
        for (let dy = dyMin; dy <= dyMax; dy++) {
            const cube = triangleCube(c.x + dx, c.y + dy, c.z - dx - dy);
            if (isValidTriangle(cube, settings)) {
                result.push(fromTriangleAxialLike(triangleCubeToAxial(cube), center));
            }
        }
    }

    return gridSuccess(result);
}

/** Cells at exactly `radius`: the range minus the range one smaller, in range order. */
export function getTriangleRing<T extends TriangleCoordinate>(center: T, radius: number, options: TriangleRegionOptions = {}): GridResult<T[]> {
    const range = getTriangleRange(center, radius, options);
    if (!range.success) return range;
    return gridSuccess(range.value.filter(cell => triangleDistance(cell, center) === radius));
}

/**
 * Cells sampled along the straight cube-space line from start to end, both
 * included, triangleDistance(start, end) + 1 of them.
 */
export function getTriangleLinePath<T extends TriangleCoordinate>(start: T, end: TriangleCoordinate): T[] {
    const n = triangleDistance(start, end);
    if (n === 0) {
        return [start];
    }

    const a = toTriangleCube(start);
    const b = toTriangleCube(end);
    const path: T[] = [];

    for (let i = 0; i <= n; i++) {
        const t = i / n;
        const rounded = roundHexCube(
            a.x + (b.x - a.x) * t,
            a.y + (b.y - a.y) * t,
            a.z + (b.z - a.z) * t,
        );
        path.push(fromTriangleAxialLike(triangleAxial(rounded.x, rounded.z), start));
    }

    return path;
}

// ═══════════════════════════════════════════════════════════════════════════
// BOUNDS / INDEXING
// ═══════════════════════════════════════════════════════════════════════════

/** True when the offset position lies in [0, width) × [0, height). */
export function isTriangleWithinBounds(coord: TriangleCoordinate, width: number, height: number): boolean {
    const { col, row } = toTriangleOffset(coord);
    return col >= 0 && col < width && row >= 0 && row < height;
}

function checkWidth(width: number): GridResult<number> {
    if (!Number.isInteger(width)) {
        return gridFailed('DEGENERATE_INPUT', `width must be a positive integer, got ${width}`, { width });
    }
    return checkSize(width, 'width');
}

/** Row-major index of an offset cell in a grid `width` columns wide. */
export function triangleOffsetToIndex(offset: TriangleOffset, width: number): GridResult<number> {
    const checked = checkWidth(width);
    if (!checked.success) return checked;

    if (offset.col < 0 || offset.col >= width || offset.row < 0) {
        return gridFailed(
            'INVALID_ARGUMENT',
            `offset (${offset.col}, ${offset.row}) is outside a grid ${width} columns wide`,
            { col: offset.col, row: offset.row, width },
        );
    }
    return gridSuccess(offset.row * width + offset.col);
}

export function triangleOffsetFromIndex(index: number, width: number): GridResult<TriangleOffset> {
    const checked = checkWidth(width);
    if (!checked.success) return checked;

    if (!Number.isInteger(index) || index < 0) {
        return gridFailed('INVALID_ARGUMENT', `index must be a non-negative integer, got ${index}`, { index });
    }
    return gridSuccess(triangleOffset(index % width, Math.floor(index / width)));
}
