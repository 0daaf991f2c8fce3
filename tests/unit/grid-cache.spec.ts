import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MemoCache, PassthroughCache, memoize } from '@/grid/cache/grid-cache';
import { createGridCacheContext, pairKey } from '@/grid/cache/grid-cache-context';
import { createGridSettings } from '@/grid/grid-settings';
import { getHexNeighborsCached, hexDistanceCached, hexToWorldCached, warmupHexCache } from '@/grid/hex/hex-cached';
import { getHexNeighbors, hexDistance } from '@/grid/hex/hex-regions';
import { hexToWorld, POINTY_TOP_LAYOUT } from '@/grid/hex/hex-layout';
import { hexAxial, hexOffsetOddQ } from '@/grid/hex/hex-coordinates';
import {
    getTriangleNeighborsCached,
    getTriangleVertexNeighborsCached,
    triangleDistanceCached,
    warmupTriangleCache,
} from '@/grid/triangle/triangle-cached';
import { getTriangleNeighbors, getTriangleVertexNeighbors } from '@/grid/triangle/triangle-regions';
import { triangleAxial, triangleOffset } from '@/grid/triangle/triangle-coordinates';
import { LogHandler } from '@/utilities/log-handler';
import { LogType, type ILogMessage } from '@/utilities/log-manager';
import { expectFailure, expectSuccess } from './grid-helpers/grid-samples';

describe('Grid caches', () => {
    let messages: ILogMessage[];

    beforeEach(() => {
        const manager = LogHandler.getLogManager();
        manager.reset();
        manager.setConsoleEnabled(false);
        messages = [];
        manager.onLogMessage(msg => messages.push(msg));
    });

    afterEach(() => {
        const manager = LogHandler.getLogManager();
        manager.onLogMessage(null);
        manager.setConsoleEnabled(true);
    });

    describe('MemoCache', () => {
        it('should count hits and misses', () => {
            const cache = new MemoCache<number>('test', 10);
            expect(cache.tryGet('a')).toEqual({ found: false });
            cache.set('a', 1);
            expect(cache.tryGet('a')).toEqual({ found: true, value: 1 });
            expect(cache.stats()).toEqual({ size: 1, hits: 1, misses: 1, hitRate: 0.5 });
        });

        it('should stop inserting once full and warn once', () => {
            const cache = new MemoCache<number>('small', 2);
            cache.set('a', 1);
            cache.set('b', 2);
            cache.set('c', 3);
            cache.set('d', 4);
            expect(cache.stats().size).toBe(2);
            expect(cache.tryGet('c')).toEqual({ found: false });

            const warnings = messages.filter(m => m.type === LogType.Warn);
            expect(warnings).toHaveLength(1);
            expect(warnings[0].source).toBe('GridCache/small');
            expect(warnings[0].msg).toBe('Reached 2 entries, further results are not stored until cleared');
        });

        it('should overwrite an existing key when full', () => {
            const cache = new MemoCache<number>('small', 1);
            cache.set('a', 1);
            cache.set('a', 5);
            expect(cache.tryGet('a')).toEqual({ found: true, value: 5 });
        });

        it('should reset entries and counters on clear', () => {
            const cache = new MemoCache<string>('test', 10);
            cache.set('a', 'x');
            cache.tryGet('a');
            cache.clear();
            expect(cache.stats()).toEqual({ size: 0, hits: 0, misses: 0, hitRate: 0 });
        });

        it('should never store in a passthrough cache', () => {
            const cache = new PassthroughCache<number>();
            cache.set('a', 1);
            expect(cache.tryGet('a')).toEqual({ found: false });
            expect(cache.stats()).toEqual({ size: 0, hits: 0, misses: 1, hitRate: 0 });
        });

        it('should compute a memoized value once', () => {
            const cache = new MemoCache<number>('test', 10);
            const compute = vi.fn(() => 42);
            expect(memoize(cache, 'k', compute)).toBe(42);
            expect(memoize(cache, 'k', compute)).toBe(42);
            expect(compute).toHaveBeenCalledTimes(1);
        });
    });

    describe('GridCacheContext', () => {
        it('should build order-independent pair keys', () => {
            expect(pairKey('b', 'a')).toBe('a|b');
            expect(pairKey('a', 'b')).toBe('a|b');
        });

        it('should return the same hex neighbors with and without a context', () => {
            const context = createGridCacheContext();
            const cell = hexOffsetOddQ(3, -1);
            expect(getHexNeighborsCached(cell, context)).toEqual(getHexNeighbors(cell));
            expect(getHexNeighborsCached(cell, context)).toEqual(getHexNeighbors(cell));
            expect(getHexNeighborsCached(cell)).toEqual(getHexNeighbors(cell));
            expect(context.stats().hexNeighbors).toEqual({ size: 1, hits: 1, misses: 1, hitRate: 0.5 });
        });

        it('should share a distance entry between (a, b) and (b, a)', () => {
            const context = createGridCacheContext();
            const a = hexAxial(0, 0);
            const b = hexAxial(3, -2);
            expect(hexDistanceCached(a, b, context)).toBe(3);
            expect(hexDistanceCached(b, a, context)).toBe(3);
            expect(context.stats().distance.hits).toBe(1);
            expect(hexDistanceCached(a, b)).toBe(hexDistance(a, b));
        });

        it('should cache world positions per size and layout', () => {
            const context = createGridCacheContext();
            const cell = hexAxial(2, 1);
            const expected = expectSuccess(hexToWorld(cell, 2, POINTY_TOP_LAYOUT));
            expect(expectSuccess(hexToWorldCached(cell, 2, POINTY_TOP_LAYOUT, context))).toEqual(expected);
            expect(expectSuccess(hexToWorldCached(cell, 2, POINTY_TOP_LAYOUT, context))).toEqual(expected);
            expectSuccess(hexToWorldCached(cell, 3, POINTY_TOP_LAYOUT, context));
            expect(context.stats().world).toEqual({ size: 2, hits: 1, misses: 2, hitRate: 1 / 3 });
            expectFailure(hexToWorldCached(cell, 0, POINTY_TOP_LAYOUT, context), 'DEGENERATE_INPUT');
        });

        it('should warm up a hex range', () => {
            const context = createGridCacheContext();
            expect(expectSuccess(warmupHexCache(context, hexAxial(0, 0), 2, 1, POINTY_TOP_LAYOUT))).toBe(19);
            expect(context.stats().hexNeighbors.size).toBe(19);
            expect(context.stats().world.size).toBe(19);
            expectFailure(warmupHexCache(context, hexAxial(0, 0), -1), 'INVALID_ARGUMENT');
        });

        it('should warm up a triangle range and serve cached neighbors', () => {
            const context = createGridCacheContext();
            expect(expectSuccess(warmupTriangleCache(context, triangleAxial(0, 0), 2))).toBe(19);
            expect(context.stats().triangleNeighbors.size).toBe(19);
            expect(context.stats().triangleVertexNeighbors.size).toBe(19);

            const cell = triangleOffset(0, 1);
            expect(getTriangleNeighborsCached(cell, context)).toEqual(getTriangleNeighbors(cell));
            expect(getTriangleVertexNeighborsCached(cell, context)).toEqual(getTriangleVertexNeighbors(cell));
            expect(context.stats().triangleNeighbors.hits).toBe(1);
        });

        it('should bound warmups and vertex neighbors by the context settings', () => {
            const context = createGridCacheContext(createGridSettings({ minCoordinate: -1, maxCoordinate: 1 }));
            expect(context.settings.maxCoordinate).toBe(1);
            expect(expectSuccess(warmupHexCache(context, hexAxial(0, 0), 2))).toBe(7);
            expect(context.stats().hexNeighbors.size).toBe(7);
            expect(expectSuccess(warmupTriangleCache(context, triangleAxial(0, 0), 2))).toBe(7);

            const origin = triangleAxial(0, 0);
            expect(getTriangleVertexNeighborsCached(origin, context)).toEqual([
                triangleAxial(0, -1),
                triangleAxial(-1, 0),
                triangleAxial(1, -1),
                triangleAxial(1, 0),
                triangleAxial(-1, 1),
                triangleAxial(0, 1),
            ]);
            expect(getTriangleVertexNeighborsCached(origin)).toHaveLength(12);
        });

        it('should cache triangle distances', () => {
            const context = createGridCacheContext();
            expect(triangleDistanceCached(triangleAxial(0, 0), triangleAxial(2, -1), context)).toBe(2);
            expect(triangleDistanceCached(triangleAxial(2, -1), triangleAxial(0, 0), context)).toBe(2);
            expect(context.stats().distance.hits).toBe(1);
        });

        it('should stay bounded by cacheMaxEntries', () => {
            const context = createGridCacheContext(createGridSettings({ cacheMaxEntries: 5 }));
            warmupHexCache(context, hexAxial(0, 0), 2);
            expect(context.stats().hexNeighbors.size).toBe(5);
        });

        it('should compute without storing when caching is disabled', () => {
            const context = createGridCacheContext(createGridSettings({ cacheEnabled: false }));
            expect(context.enabled).toBe(false);
            const cell = hexAxial(1, 1);
            expect(getHexNeighborsCached(cell, context)).toEqual(getHexNeighbors(cell));
            expect(context.stats().total.size).toBe(0);
        });

        it('should clear every cache and log it', () => {
            const context = createGridCacheContext();
            warmupTriangleCache(context, triangleAxial(0, 0), 1);
            warmupHexCache(context, hexAxial(0, 0), 1);
            context.clearAll();
            expect(context.stats().total).toEqual({ size: 0, hits: 0, misses: 0, hitRate: 0 });
            expect(messages.some(m => m.type === LogType.Debug && m.msg === 'Cleared all grid caches')).toBe(true);
        });
    });
});
