/**
 * Hex adjacency, distance and region queries.
 *
 * Every query accepts any representation and answers in the representation
 * of its input (the center, or the start of a line). Offset and doubled
 * inputs are resolved to axial first; direction vectors are never applied
 * to them directly.
 */

import { DEFAULT_GRID_SETTINGS, type GridSettings } from '../grid-settings';
import { checkDirection, checkRadius, gridFailed, gridSuccess, type GridResult } from '../errors';
import {
    hexAxial,
    hexCube,
    hexOffset,
    isValidHex,
    type HexCoordinate,
    type HexCube,
    type HexOffset,
    type HexOffsetParity,
} from './hex-coordinates';
import { axialToCube, cubeToAxial, fromHexAxialLike, toHexAxialChecked, toHexCube, toHexOffset } from './hex-conversion';
import { roundHexCube } from './hex-layout';
import {
    EHexDirection,
    HEX_AXIAL_DELTAS,
    HEX_CUBE_DELTAS,
    NUMBER_OF_HEX_DIRECTIONS,
} from './hex-directions';

export interface HexRegionOptions {
    /** Bounding range for filtering generated coordinates */
    settings?: Readonly<GridSettings>;
}

/** Re-encode a cube result in the representation of `like`. */
function fromCubeLike<T extends HexCoordinate>(cube: HexCube, like: T): T {
    return fromHexAxialLike(cubeToAxial(cube), like);
}

function stepCoordinate<T extends HexCoordinate>(coord: T, direction: number, distance = 1): T {
    const c: HexCoordinate = coord;
    if (c.kind === 'axial') {
        const [dq, dr] = HEX_AXIAL_DELTAS[direction];
        return fromHexAxialLike(hexAxial(c.q + dq * distance, c.r + dr * distance), coord);
    }
    // cube adds the cube vector directly; offset and doubled resolve to cube first
    const cube = toHexCube(c);
    const [dx, dy, dz] = HEX_CUBE_DELTAS[direction];
    return fromCubeLike(hexCube(cube.x + dx * distance, cube.y + dy * distance, cube.z + dz * distance), coord);
}

// ═══════════════════════════════════════════════════════════════════════════
// NEIGHBORS
// ═══════════════════════════════════════════════════════════════════════════

/** The six edge-adjacent cells, ordered by EHexDirection. */
export function getHexNeighbors<T extends HexCoordinate>(coord: T): T[] {
    const neighbors: T[] = [];
    for (let d = 0; d < NUMBER_OF_HEX_DIRECTIONS; d++) {
        neighbors.push(stepCoordinate(coord, d));
    }
    return neighbors;
}

/** Neighbor in one direction; INVALID_ARGUMENT outside 0-5. */
export function getHexNeighbor<T extends HexCoordinate>(coord: T, direction: EHexDirection | number): GridResult<T> {
    const checked = checkDirection(direction, NUMBER_OF_HEX_DIRECTIONS);
    if (!checked.success) return checked;
    return gridSuccess(stepCoordinate(coord, checked.value));
}

/** Cell `distance` steps away in a straight line. */
export function getHexInDirection<T extends HexCoordinate>(coord: T, direction: EHexDirection | number, distance: number): GridResult<T> {
    const checked = checkDirection(direction, NUMBER_OF_HEX_DIRECTIONS);
    if (!checked.success) return checked;
    return gridSuccess(stepCoordinate(coord, checked.value, distance));
}

// ═══════════════════════════════════════════════════════════════════════════
// DISTANCE
// ═══════════════════════════════════════════════════════════════════════════

function cubeDistance(ca: HexCube, cb: HexCube): number {
    return Math.max(
        Math.abs(ca.x - cb.x),
        Math.abs(ca.y - cb.y),
        Math.abs(ca.z - cb.z),
    );
}

/**
 * Chebyshev distance on the cube lattice: max(|dx|, |dy|, |dz|).
 * Both inputs must satisfy their own invariant (zero-sum cube, even doubled
 * col + row); hexDistanceChecked rejects those that do not.
 */
export function hexDistance(a: HexCoordinate, b: HexCoordinate): number {
    return cubeDistance(toHexCube(a), toHexCube(b));
}

export function hexDistanceChecked(a: HexCoordinate, b: HexCoordinate): GridResult<number> {
    const qa = toHexAxialChecked(a);
    if (!qa.success) return qa;
    const qb = toHexAxialChecked(b);
    if (!qb.success) return qb;
    return gridSuccess(cubeDistance(axialToCube(qa.value), axialToCube(qb.value)));
}

export function isHexInRange(coord: HexCoordinate, center: HexCoordinate, range: number): boolean {
    return hexDistance(coord, center) <= range;
}

export function areHexesAdjacent(a: HexCoordinate, b: HexCoordinate): boolean {
    return hexDistance(a, b) === 1;
}

// ═══════════════════════════════════════════════════════════════════════════
// RANGE / RING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Filled disk: every cell within `radius` of the center, 3r² + 3r + 1 of
 * them when none fall outside the bounding range.
 */
export function getHexRange<T extends HexCoordinate>(center: T, radius: number, options: HexRegionOptions = {}): GridResult<T[]> {
    const checked = checkRadius(radius);
    if (!checked.success) return checked;

    const settings = options.settings ?? DEFAULT_GRID_SETTINGS;
    const c = toHexCube(center);
    const result: T[] = [];

    for (let dx = -radius; dx <= radius; dx++) {
        const dyMin = Math.max(-radius, -dx - radius);
        const dyMax = Math.min(radius, -dx + radius);
        for (let dy = dyMin; dy <= dyMax; dy++) {
            const dz = -dx - dy;
            const cube = hexCube(c.x + dx, c.y + dy, c.z + dz);
            if (isValidHex(cube, settings)) {
                result.push(fromCubeLike(cube, center));
            }
        }
    }

    return gridSuccess(result);
}

/**
 * Shell at exactly `radius`: 6r cells (one for r = 0), counter-clockwise
 * starting from the EAST corner.
 */
export function getHexRing<T extends HexCoordinate>(center: T, radius: number, options: HexRegionOptions = {}): GridResult<T[]> {
    const checked = checkRadius(radius);
    if (!checked.success) return checked;

    const settings = options.settings ?? DEFAULT_GRID_SETTINGS;
    const c = toHexCube(center);

    if (radius === 0) {
        return gridSuccess(isValidHex(c, settings) ? [center] : []);
    }

    const result: T[] = [];
    for (let i = 0; i < NUMBER_OF_HEX_DIRECTIONS; i++) {
        const [cx, cy, cz] = HEX_CUBE_DELTAS[i];
        const [sx, sy, sz] = HEX_CUBE_DELTAS[(i + 2) % NUMBER_OF_HEX_DIRECTIONS];
        for (let j = 0; j < radius; j++) {
            const cube = hexCube(
                c.x + cx * radius + sx * j,
                c.y + cy * radius + sy * j,
                c.z + cz * radius + sz * j,
            );
            if (isValidHex(cube, settings)) {
                result.push(fromCubeLike(cube, center));
            }
        }
    }

    return gridSuccess(result);
}

/** Concentric rings 0..radius, innermost first. */
export function getHexSpiral<T extends HexCoordinate>(center: T, radius: number, options: HexRegionOptions = {}): GridResult<T[]> {
    const checked = checkRadius(radius);
    if (!checked.success) return checked;

    const result: T[] = [];
    for (let r = 0; r <= radius; r++) {
        const ring = getHexRing(center, r, options);
        if (!ring.success) return ring;
        result.push(...ring.value);
    }
    return gridSuccess(result);
}

// ═══════════════════════════════════════════════════════════════════════════
// LINE PATH
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Cells on the straight line from start to end, both included.
 *
 * Interpolates the cube floats at t = i / n for i in 0..n and cube-rounds
 * each sample, so the path has hexDistance(start, end) + 1 cells.
 * The result uses the representation of `start`.
 */
export function getHexLinePath<T extends HexCoordinate>(start: T, end: HexCoordinate): T[] {
    const n = hexDistance(start, end);
    const a = toHexCube(start);

    if (n === 0) {
        return [start];
    }

    const b = toHexCube(end);
    const path: T[] = [];

    for (let i = 0; i <= n; i++) {
        const t = i / n;
        const x = a.x + (b.x - a.x) * t;
        const y = a.y + (b.y - a.y) * t;
        const z = a.z + (b.z - a.z) * t;
        path.push(fromCubeLike(roundHexCube(x, y, z), start));
    }

    return path;
}

// ═══════════════════════════════════════════════════════════════════════════
// TRANSFORMS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Rotate about the origin in 60° steps. One step maps cube (x, y, z) to
 * (-z, -x, -y), turning EAST into SOUTH_EAST; negative steps turn the
 * other way.
 */
export function rotateHex<T extends HexCoordinate>(coord: T, steps: number): T {
    const n = ((steps % 6) + 6) % 6;
    let { x, y, z } = toHexCube(coord);
    for (let i = 0; i < n; i++) {
        [x, y, z] = [-z, -x, -y];
    }
    return fromCubeLike(hexCube(x, y, z), coord);
}

export function rotateHexAround<T extends HexCoordinate>(coord: T, center: HexCoordinate, steps: number): T {
    const c = toHexCube(coord);
    const o = toHexCube(center);
    const rotated = rotateHex(hexCube(c.x - o.x, c.y - o.y, c.z - o.z), steps);
    return fromCubeLike(hexCube(rotated.x + o.x, rotated.y + o.y, rotated.z + o.z), coord);
}

/**
 * Mirror across a cube axis: axis 0 keeps x and swaps y/z, axis 1 keeps y,
 * axis 2 keeps z. INVALID_ARGUMENT for any other axis.
 */
export function reflectHex<T extends HexCoordinate>(coord: T, axis: number): GridResult<T> {
    const { x, y, z } = toHexCube(coord);
    switch (axis) {
    case 0:
        return gridSuccess(fromCubeLike(hexCube(x, z, y), coord));
    case 1:
        return gridSuccess(fromCubeLike(hexCube(z, y, x), coord));
    case 2:
        return gridSuccess(fromCubeLike(hexCube(y, x, z), coord));
    default:
        return gridFailed('INVALID_ARGUMENT', `axis must be 0, 1 or 2, got ${axis}`, { axis });
    }
}

// ═══════════════════════════════════════════════════════════════════════════
// OFFSET RECTANGLES
// ═══════════════════════════════════════════════════════════════════════════

export interface OffsetBounds {
    minCol: number;
    maxCol: number;
    minRow: number;
    maxRow: number;
}

/** True when the cell's offset position (in `parity`) lies inside the bounds, inclusive. */
export function isHexInRectangle(coord: HexCoordinate, bounds: OffsetBounds, parity: HexOffsetParity = 'odd-q'): boolean {
    const { col, row } = toHexOffset(coord, parity);
    return col >= bounds.minCol && col <= bounds.maxCol && row >= bounds.minRow && row <= bounds.maxRow;
}

/** Every offset cell in the rectangle, column by column. */
export function getHexOffsetRectangle(parity: HexOffsetParity, bounds: OffsetBounds): HexOffset[] {
    const result: HexOffset[] = [];
    for (let col = bounds.minCol; col <= bounds.maxCol; col++) {
        for (let row = bounds.minRow; row <= bounds.maxRow; row++) {
            result.push(hexOffset(parity, col, row));
        }
    }
    return result;
}
