/**
 * Triangle grid coordinates.
 *
 * Usage:
 *   import { triangleAxial, getTriangleNeighbors } from '@/grid/triangle';
 *   const around = getTriangleNeighbors(triangleAxial(0, 0));
 */

export {
    triangleCube,
    createTriangleCube,
    triangleAxial,
    triangleOffset,
    triangleAxialFromVector,
    triangleOffsetFromVector,
    triangleToVector,
    isTriangleUpward,
    triangleOrientation,
    isValidTriangle,
    triangleEquals,
    triangleHash,
    triangleKey,
    formatTriangle,
    addTriangleAxial,
    subtractTriangleAxial,
    addTriangleCube,
    subtractTriangleCube,
    type TriangleCube,
    type TriangleAxial,
    type TriangleOffset,
    type TriangleCoordinate,
    type TriangleKind,
    type TriangleOfKind,
    type TriangleOrientation,
} from './triangle-coordinates';

export {
    ETriangleEdge,
    NUMBER_OF_TRIANGLE_EDGES,
    MAX_TRIANGLE_VERTEX_NEIGHBORS,
    TRIANGLE_UP_DELTAS,
    TRIANGLE_DOWN_DELTAS,
    triangleEdgeDeltas,
} from './triangle-directions';

export {
    triangleCubeToAxial,
    triangleAxialToCube,
    triangleAxialToOffset,
    triangleOffsetToAxial,
    toTriangleAxial,
    toTriangleCube,
    toTriangleOffset,
    convertTriangle,
    fromTriangleAxialLike,
} from './triangle-conversion';

export {
    triangleToWorld,
    triangleFromWorld,
    triangleCorners,
    type TriangleAlignment,
} from './triangle-layout';

export {
    getTriangleNeighbors,
    getTriangleNeighbor,
    getTriangleVertexNeighbors,
    areTrianglesAdjacent,
    triangleDistance,
    getTriangleRange,
    getTriangleRing,
    getTriangleLinePath,
    isTriangleWithinBounds,
    triangleOffsetToIndex,
    triangleOffsetFromIndex,
    type TriangleRegionOptions,
} from './triangle-regions';

export {
    getTriangleNeighborsCached,
    getTriangleVertexNeighborsCached,
    triangleDistanceCached,
    warmupTriangleCache,
} from './triangle-cached';
