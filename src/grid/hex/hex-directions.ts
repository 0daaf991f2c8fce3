/**
 * Six-direction tables for the hex grid.
 *
 * Axial deltas (q, r) and cube deltas (x, y, z) with q = x, r = z:
 *
 *   EAST       = ( 1,  0)  ( 1, -1,  0)
 *   NORTH_EAST = ( 1, -1)  ( 1,  0, -1)
 *   NORTH_WEST = ( 0, -1)  ( 0,  1, -1)
 *   WEST       = (-1,  0)  (-1,  1,  0)
 *   SOUTH_WEST = (-1,  1)  (-1,  0,  1)
 *   SOUTH_EAST = ( 0,  1)  ( 0, -1,  1)
 *
 * Names assume screen orientation, with r growing downward. Directions are
 * ordered counter-clockwise, so direction (i + 2) % 6 is the edge walked
 * after leaving a ring corner in direction i.
 */

export enum EHexDirection {
    EAST = 0,
    NORTH_EAST = 1,
    NORTH_WEST = 2,
    WEST = 3,
    SOUTH_WEST = 4,
    SOUTH_EAST = 5,
}

export const NUMBER_OF_HEX_DIRECTIONS = 6;

/** [dq, dr] indexed by EHexDirection */
export const HEX_AXIAL_DELTAS: ReadonlyArray<readonly [number, number]> = [
    [1, 0],    // EAST
    [1, -1],   // NORTH_EAST
    [0, -1],   // NORTH_WEST
    [-1, 0],   // WEST
    [-1, 1],   // SOUTH_WEST
    [0, 1],    // SOUTH_EAST
];

/** [dx, dy, dz] indexed by EHexDirection */
export const HEX_CUBE_DELTAS: ReadonlyArray<readonly [number, number, number]> = HEX_AXIAL_DELTAS.map(
    ([dq, dr]) => [dq, -dq - dr, dr] as const,
);

/**
 * Offset-coordinate deltas [dcol, drow], indexed [columnParity][direction]
 * where columnParity is col & 1.
 *
 * Odd-q pushes odd columns down half a cell; even-q pushes even columns
 * down. The two tables are the same rows with the parity index swapped.
 * Offset neighbors are computed through axial form; these tables document
 * the resulting deltas and are checked against it in the tests.
 */
export const HEX_ODD_Q_DELTAS: ReadonlyArray<ReadonlyArray<readonly [number, number]>> = [
    // even column
    [[1, 0], [1, -1], [0, -1], [-1, -1], [-1, 0], [0, 1]],
    // odd column
    [[1, 1], [1, 0], [0, -1], [-1, 0], [-1, 1], [0, 1]],
];

export const HEX_EVEN_Q_DELTAS: ReadonlyArray<ReadonlyArray<readonly [number, number]>> = [
    HEX_ODD_Q_DELTAS[1],
    HEX_ODD_Q_DELTAS[0],
];

/**
 * Rotate a direction by `offset` steps.
 * Positive offset = counter-clockwise, negative = clockwise.
 */
export function rotateHexDirection(direction: EHexDirection, offset: number): EHexDirection {
    return (((direction + offset) % NUMBER_OF_HEX_DIRECTIONS + NUMBER_OF_HEX_DIRECTIONS) % NUMBER_OF_HEX_DIRECTIONS) as EHexDirection;
}

export function oppositeHexDirection(direction: EHexDirection): EHexDirection {
    return rotateHexDirection(direction, 3);
}
