/**
 * Hex coordinate representations.
 *
 * One closed union per tessellation; every form is an alternate encoding of
 * the same cube coordinate. Only cube and axial forms take direction-vector
 * arithmetic; offset and doubled forms go through axial for that.
 *
 *   Cube     (x, y, z)   x + y + z = 0
 *   Axial    (q, r)      q = x, r = z
 *   Offset   (col, row)  odd-q or even-q, column parity picks the branch
 *   Doubled  (col, row)  col = q, row = 2r + q, (col + row) even
 */

import { DEFAULT_GRID_SETTINGS, isWithinCoordinateRange, type GridSettings } from '../grid-settings';
import { gridFailed, gridSuccess, type GridResult } from '../errors';
import { mod, noNegativeZero, type Vector2Int } from '../point';

export interface HexCube {
    readonly kind: 'cube';
    readonly x: number;
    readonly y: number;
    readonly z: number;
}

export interface HexAxial {
    readonly kind: 'axial';
    readonly q: number;
    readonly r: number;
}

export type HexOffsetParity = 'odd-q' | 'even-q';

export interface HexOffset {
    readonly kind: 'offset';
    readonly parity: HexOffsetParity;
    readonly col: number;
    readonly row: number;
}

export interface HexDoubled {
    readonly kind: 'doubled';
    readonly col: number;
    readonly row: number;
}

export type HexCoordinate = HexCube | HexAxial | HexOffset | HexDoubled;

export type HexKind = HexCoordinate['kind'];

/** The forms direction vectors can be added to directly */
export type HexCanonical = HexCube | HexAxial;

/** Maps a kind tag to its coordinate type */
export type HexOfKind<K extends HexKind> = Extract<HexCoordinate, { kind: K }>;

// ═══════════════════════════════════════════════════════════════════════════
// CONSTRUCTORS
// ═══════════════════════════════════════════════════════════════════════════

/** Unchecked cube factory; isValidHex reports a broken zero-sum. */
export function hexCube(x: number, y: number, z: number): HexCube {
    return { kind: 'cube', x: noNegativeZero(x), y: noNegativeZero(y), z: noNegativeZero(z) };
}

/** Cube factory that rejects coordinates not summing to zero. */
export function createHexCube(x: number, y: number, z: number): GridResult<HexCube> {
    if (x + y + z !== 0) {
        return gridFailed('INVARIANT_VIOLATION', `Cube coordinate must satisfy x + y + z = 0, got ${x} + ${y} + ${z} = ${x + y + z}`, { x, y, z });
    }
    return gridSuccess(hexCube(x, y, z));
}

export function hexAxial(q: number, r: number): HexAxial {
    return { kind: 'axial', q: noNegativeZero(q), r: noNegativeZero(r) };
}

export function hexOffset(parity: HexOffsetParity, col: number, row: number): HexOffset {
    return { kind: 'offset', parity, col: noNegativeZero(col), row: noNegativeZero(row) };
}

export function hexOffsetOddQ(col: number, row: number): HexOffset {
    return hexOffset('odd-q', col, row);
}

export function hexOffsetEvenQ(col: number, row: number): HexOffset {
    return hexOffset('even-q', col, row);
}

/** Unchecked doubled factory; isValidHex reports an odd col + row. */
export function hexDoubled(col: number, row: number): HexDoubled {
    return { kind: 'doubled', col: noNegativeZero(col), row: noNegativeZero(row) };
}

/** Doubled factory that rejects an odd col + row. */
export function createHexDoubled(col: number, row: number): GridResult<HexDoubled> {
    if (!isDoubledParityValid(col, row)) {
        return gridFailed('INVARIANT_VIOLATION', `Doubled coordinate must satisfy (col + row) even, got (${col}, ${row})`, { col, row });
    }
    return gridSuccess(hexDoubled(col, row));
}

export function hexAxialFromVector(v: Vector2Int): HexAxial {
    return hexAxial(v.x, v.y);
}

export function hexDoubledFromVector(v: Vector2Int): HexDoubled {
    return hexDoubled(v.x, v.y);
}

export function hexOffsetFromVector(parity: HexOffsetParity, v: Vector2Int): HexOffset {
    return hexOffset(parity, v.x, v.y);
}

/** Flatten a two-component form to a plain vector. */
export function hexToVector(coord: HexAxial | HexOffset | HexDoubled): Vector2Int {
    return coord.kind === 'axial' ? { x: coord.q, y: coord.r } : { x: coord.col, y: coord.row };
}

export const HEX_ORIGIN: HexAxial = hexAxial(0, 0);

// ═══════════════════════════════════════════════════════════════════════════
// VALIDITY
// ═══════════════════════════════════════════════════════════════════════════

export function isDoubledParityValid(col: number, row: number): boolean {
    return mod(col + row, 2) === 0;
}

/**
 * Row shift of an offset column. (col - (col & 1)) / 2 is floor(col / 2) for
 * negative columns as well.
 */
export function offsetRowShift(parity: HexOffsetParity, col: number): number {
    return parity === 'odd-q' ? (col - (col & 1)) / 2 : (col + (col & 1)) / 2;
}

/** Axial (q, r) of a form whose own invariant holds, null when it does not. */
function axialOf(coord: HexCoordinate): [number, number] | null {
    switch (coord.kind) {
    case 'cube':
        return coord.x + coord.y + coord.z === 0 ? [coord.x, coord.z] : null;
    case 'axial':
        return [coord.q, coord.r];
    case 'offset':
        return [coord.col, coord.row - offsetRowShift(coord.parity, coord.col)];
    case 'doubled':
        return isDoubledParityValid(coord.col, coord.row) ? [coord.col, (coord.row - coord.col) / 2] : null;
    }
}

/**
 * Invariant check on the form itself, then the bounding range on all three
 * cube axes, so every encoding of a cell agrees. Out-of-range coordinates
 * are inert: region queries skip them.
 */
export function isValidHex(coord: HexCoordinate, settings: Readonly<GridSettings> = DEFAULT_GRID_SETTINGS): boolean {
    const axial = axialOf(coord);
    if (axial === null) return false;
    const [q, r] = axial;
    return isWithinCoordinateRange(settings, q, -q - r, r);
}

/**
 * Nudge an invalid doubled coordinate onto the parity lattice. The axis with
 * the smaller magnitude (col on a tie) moves one unit away from zero; the
 * other axis is left alone. Valid input comes back unchanged.
 */
export function getNearestValidDoubled(col: number, row: number): HexDoubled {
    if (isDoubledParityValid(col, row)) {
        return hexDoubled(col, row);
    }
    if (Math.abs(col) <= Math.abs(row)) {
        return hexDoubled(col + (col >= 0 ? 1 : -1), row);
    }
    return hexDoubled(col, row + (row >= 0 ? 1 : -1));
}

// ═══════════════════════════════════════════════════════════════════════════
// EQUALITY, HASH, STRING FORM
// ═══════════════════════════════════════════════════════════════════════════

/** Structural equality; coordinates of different kinds are never equal. */
export function hexEquals(a: HexCoordinate, b: HexCoordinate): boolean {
    switch (a.kind) {
    case 'cube':
        return b.kind === 'cube' && a.x === b.x && a.y === b.y && a.z === b.z;
    case 'axial':
        return b.kind === 'axial' && a.q === b.q && a.r === b.r;
    case 'offset':
        return b.kind === 'offset' && a.parity === b.parity && a.col === b.col && a.row === b.row;
    case 'doubled':
        return b.kind === 'doubled' && a.col === b.col && a.row === b.row;
    }
}

const KIND_SEED: Record<HexKind, number> = {
    cube: 0x1b873593,
    axial: 0x2c1b3c6d,
    offset: 0x297a2d39,
    doubled: 0x6c8e9cf5,
};

function mix(h: number, value: number): number {
    let k = Math.imul(value | 0, 0xcc9e2d51);
    k = (k << 15) | (k >>> 17);
    k = Math.imul(k, 0x1b873593);
    const next = h ^ k;
    return (Math.imul((next << 13) | (next >>> 19), 5) + 0xe6546b64) | 0;
}

function finalizeHash(h: number): number {
    let f = h ^ (h >>> 16);
    f = Math.imul(f, 0x85ebca6b);
    f ^= f >>> 13;
    f = Math.imul(f, 0xc2b2ae35);
    return (f ^ (f >>> 16)) >>> 0;
}

/** Deterministic unsigned 32-bit hash over the kind and components. */
export function hashComponents(seed: number, ...components: number[]): number {
    let h = seed;
    for (const c of components) {
        h = mix(h, c);
    }
    return finalizeHash(h);
}

function components(coord: HexCoordinate): number[] {
    switch (coord.kind) {
    case 'cube':
        return [coord.x, coord.y, coord.z];
    case 'axial':
        return [coord.q, coord.r];
    case 'offset':
        return [coord.parity === 'odd-q' ? 1 : 0, coord.col, coord.row];
    case 'doubled':
        return [coord.col, coord.row];
    }
}

export function hexHash(coord: HexCoordinate): number {
    return hashComponents(KIND_SEED[coord.kind], ...components(coord));
}

/** String key for Map lookups, unique per kind and value */
export function hexKey(coord: HexCoordinate): string {
    return coord.kind + ':' + components(coord).join(',');
}

export function formatHex(coord: HexCoordinate): string {
    switch (coord.kind) {
    case 'cube':
        return `Cube(${coord.x}, ${coord.y}, ${coord.z})`;
    case 'axial':
        return `Axial(${coord.q}, ${coord.r})`;
    case 'offset':
        return `${coord.parity === 'odd-q' ? 'OffsetOddQ' : 'OffsetEvenQ'}(${coord.col}, ${coord.row})`;
    case 'doubled':
        return `Doubled(${coord.col}, ${coord.row})`;
    }
}

// ═══════════════════════════════════════════════════════════════════════════
// ARITHMETIC (canonical forms only)
// ═══════════════════════════════════════════════════════════════════════════

export function addHex<T extends HexCanonical>(a: T, b: T): T;
export function addHex(a: HexCanonical, b: HexCanonical): HexCanonical {
    if (a.kind === 'cube' && b.kind === 'cube') {
        return hexCube(a.x + b.x, a.y + b.y, a.z + b.z);
    }
    if (a.kind === 'axial' && b.kind === 'axial') {
        return hexAxial(a.q + b.q, a.r + b.r);
    }
    throw new TypeError(`addHex needs two coordinates of the same kind, got ${a.kind} and ${b.kind}`);
}

export function subtractHex<T extends HexCanonical>(a: T, b: T): T;
export function subtractHex(a: HexCanonical, b: HexCanonical): HexCanonical {
    if (a.kind === 'cube' && b.kind === 'cube') {
        return hexCube(a.x - b.x, a.y - b.y, a.z - b.z);
    }
    if (a.kind === 'axial' && b.kind === 'axial') {
        return hexAxial(a.q - b.q, a.r - b.r);
    }
    throw new TypeError(`subtractHex needs two coordinates of the same kind, got ${a.kind} and ${b.kind}`);
}

export function scaleHex<T extends HexCanonical>(a: T, scalar: number): T;
export function scaleHex(a: HexCanonical, scalar: number): HexCanonical {
    return a.kind === 'cube'
        ? hexCube(a.x * scalar, a.y * scalar, a.z * scalar)
        : hexAxial(a.q * scalar, a.r * scalar);
}

export function negateHex<T extends HexCanonical>(a: T): T;
export function negateHex(a: HexCanonical): HexCanonical {
    return scaleHex(a, -1);
}
