/**
 * Hex grid coordinates.
 *
 * Usage:
 *   import { hexAxial, getHexRing, hexToWorld, POINTY_TOP_LAYOUT } from '@/grid/hex';
 *   const ring = unwrapGridResult(getHexRing(hexAxial(0, 0), 2));
 */

// Representations
export {
    hexCube,
    createHexCube,
    hexAxial,
    hexOffset,
    hexOffsetOddQ,
    hexOffsetEvenQ,
    hexDoubled,
    createHexDoubled,
    hexAxialFromVector,
    hexDoubledFromVector,
    hexOffsetFromVector,
    hexToVector,
    HEX_ORIGIN,
    isDoubledParityValid,
    offsetRowShift,
    isValidHex,
    getNearestValidDoubled,
    hexEquals,
    hexHash,
    hexKey,
    formatHex,
    addHex,
    subtractHex,
    scaleHex,
    negateHex,
    type HexCube,
    type HexAxial,
    type HexOffset,
    type HexOffsetParity,
    type HexDoubled,
    type HexCoordinate,
    type HexKind,
    type HexCanonical,
    type HexOfKind,
} from './hex-coordinates';

// Directions
export {
    EHexDirection,
    NUMBER_OF_HEX_DIRECTIONS,
    HEX_AXIAL_DELTAS,
    HEX_CUBE_DELTAS,
    HEX_ODD_Q_DELTAS,
    HEX_EVEN_Q_DELTAS,
    rotateHexDirection,
    oppositeHexDirection,
} from './hex-directions';

// Conversion
export {
    cubeToAxial,
    offsetToAxial,
    doubledToAxial,
    toHexAxial,
    toHexAxialChecked,
    axialToCube,
    axialToOffset,
    axialToDoubled,
    toHexCube,
    toHexOffset,
    toHexDoubled,
    hexTargetOf,
    convertHex,
    convertHexAll,
    fromHexAxialLike,
    type HexTarget,
} from './hex-conversion';

// World mapping
export {
    POINTY_TOP_LAYOUT,
    FLAT_TOP_LAYOUT,
    getHexLayout,
    roundHexCube,
    roundHexAxial,
    hexToWorld,
    hexFromWorld,
    hexCorners,
    worldToFractionalAxial,
    type HexLayout,
} from './hex-layout';

// Adjacency, distance, regions
export {
    getHexNeighbors,
    getHexNeighbor,
    getHexInDirection,
    hexDistance,
    hexDistanceChecked,
    isHexInRange,
    areHexesAdjacent,
    getHexRange,
    getHexRing,
    getHexSpiral,
    getHexLinePath,
    rotateHex,
    rotateHexAround,
    reflectHex,
    isHexInRectangle,
    getHexOffsetRectangle,
    type HexRegionOptions,
    type OffsetBounds,
} from './hex-regions';

export {
    hexAngleBetween,
    hexAngleBetweenRadians,
    hexWorldDistance,
    compassDirectionName,
    type CompassDirection,
} from './hex-angles';

// Memoized queries
export { getHexNeighborsCached, hexDistanceCached, hexToWorldCached, warmupHexCache } from './hex-cached';
