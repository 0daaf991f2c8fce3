/**
 * Edge directions on the triangle grid.
 *
 * Cells are laid out in horizontal rows (axial r), alternating upward and
 * downward triangles along the row (axial q). A cell is upward when q + r is
 * even. Rows grow upward in world space, so an upward triangle has its base
 * at the bottom and a downward one at the top:
 *
 *            upward (q, r)              downward (q, r)
 *                 /\                      ________
 *     LEFT (-1,0)/  \RIGHT (+1,0)     LEFT\      /RIGHT
 *               /____\                 (-1,0)\  /(+1,0)
 *            BASE (0,-1)                      \/
 *                                          BASE (0,+1) is above
 *
 * Every edge delta is also a hex cube direction, so edge neighbors are at
 * cube distance 1.
 */

export enum ETriangleEdge {
    RIGHT = 0,
    LEFT = 1,
    BASE = 2,
}

export const NUMBER_OF_TRIANGLE_EDGES = 3;

/** Upper bound on cells sharing a corner with one cell */
export const MAX_TRIANGLE_VERTEX_NEIGHBORS = 12;

/** [dq, dr] for an upward triangle, indexed by ETriangleEdge */
export const TRIANGLE_UP_DELTAS: ReadonlyArray<readonly [number, number]> = [
    [1, 0],    // RIGHT
    [-1, 0],   // LEFT
    [0, -1],   // BASE (below)
];

/** [dq, dr] for a downward triangle; the upward table mirrored vertically */
export const TRIANGLE_DOWN_DELTAS: ReadonlyArray<readonly [number, number]> = [
    [1, 0],    // RIGHT
    [-1, 0],   // LEFT
    [0, 1],    // BASE (above)
];

export function triangleEdgeDeltas(upward: boolean): ReadonlyArray<readonly [number, number]> {
    return upward ? TRIANGLE_UP_DELTAS : TRIANGLE_DOWN_DELTAS;
}
