/**
 * Hex conversion engine.
 *
 * Every conversion goes through axial form: a derived form is decoded to
 * axial, then encoded to the target. Adding a representation therefore
 * needs one decoder and one encoder, never a formula per pair.
 */

import {
    hexAxial,
    hexCube,
    hexDoubled,
    hexOffset,
    createHexCube,
    createHexDoubled,
    offsetRowShift,
    type HexAxial,
    type HexCoordinate,
    type HexCube,
    type HexDoubled,
    type HexOfKind,
    type HexOffset,
    type HexOffsetParity,
} from './hex-coordinates';
import { gridSuccess, mapGridResult, type GridResult } from '../errors';

// ═══════════════════════════════════════════════════════════════════════════
// DECODERS (any form → axial)
// ═══════════════════════════════════════════════════════════════════════════

/** Drop the redundant axis: q = x, r = z. */
export function cubeToAxial(cube: HexCube): HexAxial {
    return hexAxial(cube.x, cube.z);
}

/** Odd-q shifts odd columns by half a row, even-q shifts even columns. */
export function offsetToAxial(offset: HexOffset): HexAxial {
    return hexAxial(offset.col, offset.row - offsetRowShift(offset.parity, offset.col));
}

/**
 * Unchecked: an odd col + row yields a fractional r. toHexAxialChecked
 * rejects that input instead.
 */
export function doubledToAxial(doubled: HexDoubled): HexAxial {
    return hexAxial(doubled.col, (doubled.row - doubled.col) / 2);
}

export function toHexAxial(coord: HexCoordinate): HexAxial {
    switch (coord.kind) {
    case 'axial':
        return coord;
    case 'cube':
        return cubeToAxial(coord);
    case 'offset':
        return offsetToAxial(coord);
    case 'doubled':
        return doubledToAxial(coord);
    }
}

/**
 * Decode that refuses a broken cube zero-sum or an odd doubled parity
 * rather than producing a coordinate off the lattice.
 */
export function toHexAxialChecked(coord: HexCoordinate): GridResult<HexAxial> {
    switch (coord.kind) {
    case 'cube':
        return mapGridResult(createHexCube(coord.x, coord.y, coord.z), cubeToAxial);
    case 'doubled':
        return mapGridResult(createHexDoubled(coord.col, coord.row), doubledToAxial);
    default:
        return gridSuccess(toHexAxial(coord));
    }
}

// ═══════════════════════════════════════════════════════════════════════════
// ENCODERS (axial → any form)
// ═══════════════════════════════════════════════════════════════════════════

/** Reconstruct the third axis; y = -q - r keeps the zero sum by construction. */
export function axialToCube(axial: HexAxial): HexCube {
    return hexCube(axial.q, -axial.q - axial.r, axial.r);
}

export function axialToOffset(axial: HexAxial, parity: HexOffsetParity): HexOffset {
    return hexOffset(parity, axial.q, axial.r + offsetRowShift(parity, axial.q));
}

export function axialToDoubled(axial: HexAxial): HexDoubled {
    return hexDoubled(axial.q, 2 * axial.r + axial.q);
}

export function toHexCube(coord: HexCoordinate): HexCube {
    return coord.kind === 'cube' ? coord : axialToCube(toHexAxial(coord));
}

/** Offset form in the given parity; an offset already in that parity is returned as is. */
export function toHexOffset(coord: HexCoordinate, parity: HexOffsetParity): HexOffset {
    if (coord.kind === 'offset' && coord.parity === parity) {
        return coord;
    }
    return axialToOffset(toHexAxial(coord), parity);
}

export function toHexDoubled(coord: HexCoordinate): HexDoubled {
    return coord.kind === 'doubled' ? coord : axialToDoubled(toHexAxial(coord));
}

/** Target of a kind-directed conversion; offsets also name their parity */
export type HexTarget =
    | { kind: 'cube' }
    | { kind: 'axial' }
    | { kind: 'offset'; parity: HexOffsetParity }
    | { kind: 'doubled' };

/** The target that reproduces a coordinate's own representation */
export function hexTargetOf(coord: HexCoordinate): HexTarget {
    return coord.kind === 'offset' ? { kind: 'offset', parity: coord.parity } : { kind: coord.kind };
}

export function convertHex<T extends HexTarget>(coord: HexCoordinate, target: T): HexOfKind<T['kind']>;
export function convertHex(coord: HexCoordinate, target: HexTarget): HexCoordinate {
    switch (target.kind) {
    case 'cube':
        return toHexCube(coord);
    case 'axial':
        return toHexAxial(coord);
    case 'offset':
        return toHexOffset(coord, target.parity);
    case 'doubled':
        return toHexDoubled(coord);
    }
}

/** Convert an axial result back into the representation of `like`. */
export function fromHexAxialLike<T extends HexCoordinate>(axial: HexAxial, like: T): T;
export function fromHexAxialLike(axial: HexAxial, like: HexCoordinate): HexCoordinate {
    return convertHex(axial, hexTargetOf(like));
}

export function convertHexAll<T extends HexTarget>(coords: Iterable<HexCoordinate>, target: T): HexOfKind<T['kind']>[] {
    const result: HexOfKind<T['kind']>[] = [];
    for (const coord of coords) {
        result.push(convertHex(coord, target));
    }
    return result;
}
