/**
 * Hex world-position mapping.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * LAYOUTS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A layout is a 2×2 forward matrix (axial → world), its inverse, and the
 * angle of the first corner in units of 60°.
 *
 *   pointy-top   x = size * (√3 q + √3/2 r)      q = (√3/3 x - 1/3 y) / size
 *                y = size * (3/2 r)              r = (2/3 y) / size
 *
 *   flat-top     x = size * (3/2 q)              q = (2/3 x) / size
 *                y = size * (√3/2 q + √3 r)      r = (-1/3 x + √3/3 y) / size
 *
 * The inverse yields fractional cube coordinates (x = q, z = r,
 * y = -q - r) that cube rounding snaps to the containing cell.
 */

import { DEFAULT_GRID_SETTINGS, type HexLayoutName } from '../grid-settings';
import { checkSize, gridSuccess, mapGridResult, type GridResult } from '../errors';
import { point3, roundHalfEven, type Point3 } from '../point';
import { hexAxial, hexCube, type HexAxial, type HexCoordinate, type HexCube } from './hex-coordinates';
import { toHexAxial } from './hex-conversion';

export interface HexLayout {
    readonly name: HexLayoutName;
    /** Row-major forward matrix [f0, f1, f2, f3] */
    readonly forward: readonly [number, number, number, number];
    /** Row-major inverse matrix [b0, b1, b2, b3] */
    readonly inverse: readonly [number, number, number, number];
    /** First corner angle, in multiples of 60° */
    readonly startAngle: number;
}

const SQRT3 = Math.sqrt(3);

export const POINTY_TOP_LAYOUT: HexLayout = {
    name: 'pointy-top',
    forward: [SQRT3, SQRT3 / 2, 0, 3 / 2],
    inverse: [SQRT3 / 3, -1 / 3, 0, 2 / 3],
    startAngle: 0.5,
};

export const FLAT_TOP_LAYOUT: HexLayout = {
    name: 'flat-top',
    forward: [3 / 2, 0, SQRT3 / 2, SQRT3],
    inverse: [2 / 3, 0, -1 / 3, SQRT3 / 3],
    startAngle: 0,
};

export function getHexLayout(name: HexLayoutName = DEFAULT_GRID_SETTINGS.defaultHexLayout): HexLayout {
    return name === 'flat-top' ? FLAT_TOP_LAYOUT : POINTY_TOP_LAYOUT;
}

// ═══════════════════════════════════════════════════════════════════════════
// CUBE ROUNDING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Snap fractional cube coordinates to the nearest cell.
 *
 * Each axis is rounded on its own, then the axis with the largest rounding
 * error is recomputed from the other two so x + y + z = 0 holds exactly.
 * Equal largest errors resolve x first, then y, then z.
 */
export function roundHexCube(x: number, y: number, z: number): HexCube {
    let rx = roundHalfEven(x);
    let ry = roundHalfEven(y);
    let rz = roundHalfEven(z);

    const dx = Math.abs(rx - x);
    const dy = Math.abs(ry - y);
    const dz = Math.abs(rz - z);

    if (dx >= dy && dx >= dz) {
        rx = -ry - rz;
    } else if (dy >= dz) {
        ry = -rx - rz;
    } else {
        rz = -rx - ry;
    }

    return hexCube(rx, ry, rz);
}

export function roundHexAxial(q: number, r: number): HexAxial {
    const cube = roundHexCube(q, -q - r, r);
    return hexAxial(cube.x, cube.z);
}

// ═══════════════════════════════════════════════════════════════════════════
// FORWARD / INVERSE
// ═══════════════════════════════════════════════════════════════════════════

/** Axial → world position without precondition checks. */
export function axialToWorldUnchecked(axial: HexAxial, size: number, layout: HexLayout): Point3 {
    const [f0, f1, f2, f3] = layout.forward;
    return point3(
        (f0 * axial.q + f1 * axial.r) * size,
        (f2 * axial.q + f3 * axial.r) * size,
    );
}

/** World position of a cell center. Fails with DEGENERATE_INPUT for size <= 0. */
export function hexToWorld(
    coord: HexCoordinate,
    size: number = DEFAULT_GRID_SETTINGS.defaultSize,
    layout: HexLayout = getHexLayout(),
): GridResult<Point3> {
    return mapGridResult(checkSize(size), s => axialToWorldUnchecked(toHexAxial(coord), s, layout));
}

/** Fractional axial coordinates of a world point (before rounding). */
export function worldToFractionalAxial(point: Point3, size: number, layout: HexLayout): { q: number; r: number } {
    const [b0, b1, b2, b3] = layout.inverse;
    const px = point.x / size;
    const py = point.y / size;
    return {
        q: b0 * px + b1 * py,
        r: b2 * px + b3 * py,
    };
}

/** Cell containing a world point, in axial form. */
export function hexFromWorld(
    point: Point3,
    size: number = DEFAULT_GRID_SETTINGS.defaultSize,
    layout: HexLayout = getHexLayout(),
): GridResult<HexAxial> {
    return mapGridResult(checkSize(size), s => {
        const { q, r } = worldToFractionalAxial(point, s, layout);
        return roundHexAxial(q, r);
    });
}

/** The six corner positions of a cell, at 60° * (i + startAngle) for i in 0..5. */
export function hexCorners(
    coord: HexCoordinate,
    size: number = DEFAULT_GRID_SETTINGS.defaultSize,
    layout: HexLayout = getHexLayout(),
): GridResult<Point3[]> {
    const checked = checkSize(size);
    if (!checked.success) return checked;

    const center = axialToWorldUnchecked(toHexAxial(coord), size, layout);
    const corners: Point3[] = [];
    for (let i = 0; i < 6; i++) {
        const angle = (2 * Math.PI * (layout.startAngle + i)) / 6;
        corners.push(point3(center.x + size * Math.cos(angle), center.y + size * Math.sin(angle), center.z));
    }
    return gridSuccess(corners);
}
