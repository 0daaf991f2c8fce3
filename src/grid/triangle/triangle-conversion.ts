/**
 * Conversions between triangle representations. Everything passes through
 * axial; orientation survives because it is a function of the cell, not of
 * the encoding.
 */

import {
    triangleAxial,
    triangleCube,
    triangleOffset,
    type TriangleAxial,
    type TriangleCoordinate,
    type TriangleCube,
    type TriangleKind,
    type TriangleOffset,
    type TriangleOfKind,
} from './triangle-coordinates';

export function triangleCubeToAxial(cube: TriangleCube): TriangleAxial {
    return triangleAxial(cube.x, cube.z);
}

export function triangleAxialToCube(axial: TriangleAxial): TriangleCube {
    return triangleCube(axial.q, -axial.q - axial.r, axial.r);
}

/** col = q + floor(r / 2), row = r */
export function triangleAxialToOffset(axial: TriangleAxial): TriangleOffset {
    return triangleOffset(axial.q + (axial.r - (axial.r & 1)) / 2, axial.r);
}

export function triangleOffsetToAxial(offset: TriangleOffset): TriangleAxial {
    return triangleAxial(offset.col - (offset.row - (offset.row & 1)) / 2, offset.row);
}

export function toTriangleAxial(coord: TriangleCoordinate): TriangleAxial {
    switch (coord.kind) {
    case 'axial':
        return coord;
    case 'cube':
        return triangleCubeToAxial(coord);
    case 'offset':
        return triangleOffsetToAxial(coord);
    }
}

export function toTriangleCube(coord: TriangleCoordinate): TriangleCube {
    return coord.kind === 'cube' ? coord : triangleAxialToCube(toTriangleAxial(coord));
}

export function toTriangleOffset(coord: TriangleCoordinate): TriangleOffset {
    return coord.kind === 'offset' ? coord : triangleAxialToOffset(toTriangleAxial(coord));
}

export function convertTriangle<K extends TriangleKind>(coord: TriangleCoordinate, kind: K): TriangleOfKind<K>;
export function convertTriangle(coord: TriangleCoordinate, kind: TriangleKind): TriangleCoordinate {
    switch (kind) {
    case 'axial':
        return toTriangleAxial(coord);
    case 'cube':
        return toTriangleCube(coord);
    case 'offset':
        return toTriangleOffset(coord);
    }
}

/** Encode an axial result in the same representation as `like`. */
export function fromTriangleAxialLike<T extends TriangleCoordinate>(axial: TriangleAxial, like: T): T;
export function fromTriangleAxialLike(axial: TriangleAxial, like: TriangleCoordinate): TriangleCoordinate {
    return convertTriangle(axial, like.kind);
}
