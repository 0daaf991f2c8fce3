/**
 * Angles and world distances between cells.
 */

import { DEFAULT_GRID_SETTINGS } from '../grid-settings';
import { checkSize, mapGridResult, type GridResult } from '../errors';
import { pointDistance } from '../point';
import type { HexCoordinate } from './hex-coordinates';
import { toHexAxial } from './hex-conversion';
import { axialToWorldUnchecked, getHexLayout, type HexLayout } from './hex-layout';

export type CompassDirection = 'E' | 'NE' | 'N' | 'NW' | 'W' | 'SW' | 'S' | 'SE';

/** Compass names in 45° steps from east, counter-clockwise */
const COMPASS_NAMES: readonly CompassDirection[] = ['E', 'NE', 'N', 'NW', 'W', 'SW', 'S', 'SE'];

function worldDelta(from: HexCoordinate, to: HexCoordinate, size: number, layout: HexLayout): { dx: number; dy: number } {
    const a = axialToWorldUnchecked(toHexAxial(from), size, layout);
    const b = axialToWorldUnchecked(toHexAxial(to), size, layout);
    return { dx: b.x - a.x, dy: b.y - a.y };
}

/**
 * Angle of the vector from one cell center to another, in radians [0, 2π),
 * counter-clockwise from east as seen on screen. World y grows with r
 * (downward), so it is flipped before measuring; the NORTH_EAST neighbor is
 * therefore at 60°.
 */
export function hexAngleBetweenRadians(
    from: HexCoordinate,
    to: HexCoordinate,
    size: number = DEFAULT_GRID_SETTINGS.defaultSize,
    layout: HexLayout = getHexLayout(),
): GridResult<number> {
    return mapGridResult(checkSize(size), s => {
        const { dx, dy } = worldDelta(from, to, s, layout);
        const angle = Math.atan2(-dy, dx);
        return angle < 0 ? angle + 2 * Math.PI : angle;
    });
}

/** Same as hexAngleBetweenRadians, in degrees [0, 360). */
export function hexAngleBetween(
    from: HexCoordinate,
    to: HexCoordinate,
    size: number = DEFAULT_GRID_SETTINGS.defaultSize,
    layout: HexLayout = getHexLayout(),
): GridResult<number> {
    return mapGridResult(hexAngleBetweenRadians(from, to, size, layout), rad => (rad * 180) / Math.PI);
}

/** Euclidean distance between cell centers. */
export function hexWorldDistance(
    from: HexCoordinate,
    to: HexCoordinate,
    size: number = DEFAULT_GRID_SETTINGS.defaultSize,
    layout: HexLayout = getHexLayout(),
): GridResult<number> {
    return mapGridResult(checkSize(size), s =>
        pointDistance(
            axialToWorldUnchecked(toHexAxial(from), s, layout),
            axialToWorldUnchecked(toHexAxial(to), s, layout),
        ));
}

/** Eight-way name for an angle in degrees; each name covers 45° centred on it. */
export function compassDirectionName(angleDegrees: number): CompassDirection {
    const normalized = ((angleDegrees % 360) + 360) % 360;
    const sector = Math.floor((normalized + 22.5) / 45) % 8;
    return COMPASS_NAMES[sector];
}
