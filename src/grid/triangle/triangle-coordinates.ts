/**
 * Triangle coordinate representations.
 *
 *   Cube    (x, y, z)   x + y + z = 0
 *   Axial   (q, r)      q = x, r = z
 *   Offset  (col, row)  col = q + floor(r / 2), row = r
 *
 * Orientation is never stored. isTriangleUpward re-derives it from the
 * coordinate's own value: upward iff q + r is even (equivalently, cube y is
 * even), so every representation of a cell reports the same orientation.
 */

import { DEFAULT_GRID_SETTINGS, isWithinCoordinateRange, type GridSettings } from '../grid-settings';
import { gridFailed, gridSuccess, type GridResult } from '../errors';
import { mod, noNegativeZero, type Vector2Int } from '../point';
import { hashComponents } from '../hex/hex-coordinates';

export interface TriangleCube {
    readonly kind: 'cube';
    readonly x: number;
    readonly y: number;
    readonly z: number;
}

export interface TriangleAxial {
    readonly kind: 'axial';
    readonly q: number;
    readonly r: number;
}

export interface TriangleOffset {
    readonly kind: 'offset';
    readonly col: number;
    readonly row: number;
}

export type TriangleCoordinate = TriangleCube | TriangleAxial | TriangleOffset;

export type TriangleKind = TriangleCoordinate['kind'];

export type TriangleOfKind<K extends TriangleKind> = Extract<TriangleCoordinate, { kind: K }>;

export type TriangleOrientation = 'up' | 'down';

export function triangleCube(x: number, y: number, z: number): TriangleCube {
    return { kind: 'cube', x: noNegativeZero(x), y: noNegativeZero(y), z: noNegativeZero(z) };
}

export function createTriangleCube(x: number, y: number, z: number): GridResult<TriangleCube> {
    if (x + y + z !== 0) {
        return gridFailed('INVARIANT_VIOLATION', `Triangle cube coordinate must satisfy x + y + z = 0, got ${x} + ${y} + ${z} = ${x + y + z}`, { x, y, z });
    }
    return gridSuccess(triangleCube(x, y, z));
}

export function triangleAxial(q: number, r: number): TriangleAxial {
    return { kind: 'axial', q: noNegativeZero(q), r: noNegativeZero(r) };
}

export function triangleOffset(col: number, row: number): TriangleOffset {
    return { kind: 'offset', col: noNegativeZero(col), row: noNegativeZero(row) };
}

export function triangleAxialFromVector(v: Vector2Int): TriangleAxial {
    return triangleAxial(v.x, v.y);
}

export function triangleOffsetFromVector(v: Vector2Int): TriangleOffset {
    return triangleOffset(v.x, v.y);
}

export function triangleToVector(coord: TriangleAxial | TriangleOffset): Vector2Int {
    return coord.kind === 'axial' ? { x: coord.q, y: coord.r } : { x: coord.col, y: coord.row };
}

/** Axial components of any representation; the one place orientation is read from. */
function axialComponents(coord: TriangleCoordinate): [number, number] {
    switch (coord.kind) {
    case 'axial':
        return [coord.q, coord.r];
    case 'cube':
        return [coord.x, coord.z];
    case 'offset':
        return [coord.col - (coord.row - (coord.row & 1)) / 2, coord.row];
    }
}

export function isTriangleUpward(coord: TriangleCoordinate): boolean {
    const [q, r] = axialComponents(coord);
    return mod(q + r, 2) === 0;
}

export function triangleOrientation(coord: TriangleCoordinate): TriangleOrientation {
    return isTriangleUpward(coord) ? 'up' : 'down';
}

/**
 * Cube zero-sum on cube input, then the bounding range on all three cube
 * axes, so every encoding of a cell agrees.
 */
export function isValidTriangle(coord: TriangleCoordinate, settings: Readonly<GridSettings> = DEFAULT_GRID_SETTINGS): boolean {
    if (coord.kind === 'cube' && coord.x + coord.y + coord.z !== 0) {
        return false;
    }
    const [q, r] = axialComponents(coord);
    return isWithinCoordinateRange(settings, q, -q - r, r);
}

export function triangleEquals(a: TriangleCoordinate, b: TriangleCoordinate): boolean {
    switch (a.kind) {
    case 'cube':
        return b.kind === 'cube' && a.x === b.x && a.y === b.y && a.z === b.z;
    case 'axial':
        return b.kind === 'axial' && a.q === b.q && a.r === b.r;
    case 'offset':
        return b.kind === 'offset' && a.col === b.col && a.row === b.row;
    }
}

const KIND_SEED: Record<TriangleKind, number> = {
    cube: 0x3c6ef372,
    axial: 0x510e527f,
    offset: 0x1f83d9ab,
};

function components(coord: TriangleCoordinate): number[] {
    switch (coord.kind) {
    case 'cube':
        return [coord.x, coord.y, coord.z];
    case 'axial':
        return [coord.q, coord.r];
    case 'offset':
        return [coord.col, coord.row];
    }
}

export function triangleHash(coord: TriangleCoordinate): number {
    return hashComponents(KIND_SEED[coord.kind], ...components(coord));
}

export function triangleKey(coord: TriangleCoordinate): string {
    return 'triangle-' + coord.kind + ':' + components(coord).join(',');
}

export function formatTriangle(coord: TriangleCoordinate): string {
    const suffix = isTriangleUpward(coord) ? 'Up' : 'Down';
    switch (coord.kind) {
    case 'cube':
        return `TriangleCube(${coord.x}, ${coord.y}, ${coord.z}) [${suffix}]`;
    case 'axial':
        return `TriangleAxial(${coord.q}, ${coord.r}) [${suffix}]`;
    case 'offset':
        return `TriangleOffset(${coord.col}, ${coord.row}) [${suffix}]`;
    }
}

export function addTriangleAxial(a: TriangleAxial, b: TriangleAxial): TriangleAxial {
    return triangleAxial(a.q + b.q, a.r + b.r);
}

export function subtractTriangleAxial(a: TriangleAxial, b: TriangleAxial): TriangleAxial {
    return triangleAxial(a.q - b.q, a.r - b.r);
}

export function addTriangleCube(a: TriangleCube, b: TriangleCube): TriangleCube {
    return triangleCube(a.x + b.x, a.y + b.y, a.z + b.z);
}

export function subtractTriangleCube(a: TriangleCube, b: TriangleCube): TriangleCube {
    return triangleCube(a.x - b.x, a.y - b.y, a.z - b.z);
}
