/**
 * Triangle world-position mapping.
 *
 * With side length `size` and row height h = size·√3/2, cell (q, r) spans
 * x ∈ [(q-1)·size/2, (q+1)·size/2] and y ∈ [r·h, (r+1)·h]. Its world
 * position is the centroid: one third of the way up for an upward cell,
 * two thirds for a downward one.
 *
 * The 'vertical' alignment is the 'horizontal' one with x and y swapped:
 * columns of triangles pointing left and right.
 */

import { checkSize, gridSuccess, type GridResult } from '../errors';
import { point3, type Point3 } from '../point';
import { triangleAxial, isTriangleUpward, type TriangleAxial, type TriangleCoordinate } from './triangle-coordinates';
import { toTriangleAxial } from './triangle-conversion';

export type TriangleAlignment = 'horizontal' | 'vertical';

const SQRT3 = Math.sqrt(3);

function rowHeight(size: number): number {
    return size * SQRT3 / 2;
}

function align(x: number, y: number, alignment: TriangleAlignment): Point3 {
    return alignment === 'vertical' ? point3(y, x) : point3(x, y);
}

/** Centroid without the size check; callers have validated. */
export function triangleAxialToWorldUnchecked(axial: TriangleAxial, size: number, alignment: TriangleAlignment = 'horizontal'): Point3 {
    const h = rowHeight(size);
    const x = axial.q * size / 2;
    const y = axial.r * h + (isTriangleUpward(axial) ? h / 3 : 2 * h / 3);
    return align(x, y, alignment);
}

export function triangleToWorld(
    coord: TriangleCoordinate,
    size: number,
    alignment: TriangleAlignment = 'horizontal',
): GridResult<Point3> {
    const checked = checkSize(size);
    if (!checked.success) return checked;
    return gridSuccess(triangleAxialToWorldUnchecked(toTriangleAxial(coord), size, alignment));
}

/**
 * Containing cell of a world point. Points on a shared edge resolve to the
 * lower q (the left cell along the row) and to the upper row.
 */
export function triangleFromWorld(
    point: Point3,
    size: number,
    alignment: TriangleAlignment = 'horizontal',
): GridResult<TriangleAxial> {
    const checked = checkSize(size);
    if (!checked.success) return checked;

    const px = alignment === 'vertical' ? point.y : point.x;
    const py = alignment === 'vertical' ? point.x : point.y;

    const h = rowHeight(size);
    const r = Math.floor(py / h);
    const fy = py / h - r;
    const u = px / (size / 2);
    const q0 = Math.floor(u);
    const fx = u - q0;

    // The slanted edge inside the unit column [q0, q0 + 1] falls from left to
    // right when q0 is upward and rises when it is downward.
    const candidate = triangleAxial(q0, r);
    const inCandidate = isTriangleUpward(candidate) ? fx <= 1 - fy : fx <= fy;

    return gridSuccess(inCandidate ? candidate : triangleAxial(q0 + 1, r));
}

/** The three corners, counter-clockwise, starting at the bottom-left (upward) or the bottom apex (downward). */
export function triangleCorners(
    coord: TriangleCoordinate,
    size: number,
    alignment: TriangleAlignment = 'horizontal',
): GridResult<Point3[]> {
    const checked = checkSize(size);
    if (!checked.success) return checked;

    const { q, r } = toTriangleAxial(coord);
    const h = rowHeight(size);
    const half = size / 2;
    const cx = q * half;
    const bottom = r * h;
    const top = (r + 1) * h;

    const corners = isTriangleUpward(coord)
        ? [align(cx - half, bottom, alignment), align(cx + half, bottom, alignment), align(cx, top, alignment)]
        : [align(cx, bottom, alignment), align(cx + half, top, alignment), align(cx - half, top, alignment)];

    return gridSuccess(corners);
}
