/**
 * Hex and triangle grid coordinate algebra.
 *
 * Representations are closed tagged unions; every query answers in the
 * representation it was given. Operations with preconditions return a
 * GridResult instead of throwing.
 */

export * from './grid/hex';
export * from './grid/triangle';

export {
    GridError,
    gridSuccess,
    gridFailed,
    unwrapGridResult,
    mapGridResult,
    isGridError,
    toGridError,
    type GridErrorCode,
    type GridResult,
} from './grid/errors';

export { point3, pointDistance, type Point3, type Vector2Int } from './grid/point';

export {
    DEFAULT_GRID_SETTINGS,
    createGridSettings,
    loadGridSettings,
    parseGridSettings,
    type GridSettings,
    type HexLayoutName,
} from './grid/grid-settings';

export { MemoCache, PassthroughCache, type GridCache, type CacheStats, type CacheLookup } from './grid/cache/grid-cache';
export { createGridCacheContext, type GridCacheContext, type GridCacheContextStats } from './grid/cache/grid-cache-context';

export { LogHandler } from './utilities/log-handler';
export { LogManager, LogType, type ILogMessage, type LogMessageCallback } from './utilities/log-manager';
