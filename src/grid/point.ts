/**
 * Continuous world position. Grid layouts place cells in the x/y plane and
 * leave z at 0; z is carried so positions can be fed to 3D hosts unchanged.
 */
export interface Point3 {
    readonly x: number;
    readonly y: number;
    readonly z: number;
}

export function point3(x: number, y: number, z = 0): Point3 {
    return { x, y, z };
}

export function pointDistance(a: Point3, b: Point3): number {
    const dx = b.x - a.x;
    const dy = b.y - a.y;
    const dz = b.z - a.z;
    return Math.sqrt(dx * dx + dy * dy + dz * dz);
}

/** Integer 2-vector, the plain shape coordinates are built from and flattened to */
export interface Vector2Int {
    readonly x: number;
    readonly y: number;
}

/**
 * Round half to even, so x.5 goes to the even neighbour. Cube rounding uses
 * this per axis; boundary points therefore resolve the same way on every run.
 */
export function roundHalfEven(value: number): number {
    const floor = Math.floor(value);
    const diff = value - floor;
    if (diff < 0.5) return floor;
    if (diff > 0.5) return floor + 1;
    return floor % 2 === 0 ? floor : floor + 1;
}

/** Mathematical modulo, always in [0, b). */
export function mod(a: number, b: number): number {
    return ((a % b) + b) % b;
}

/** Normalise -0 to 0 so structural comparison and string keys stay stable. */
export function noNegativeZero(value: number): number {
    return value === 0 ? 0 : value;
}
