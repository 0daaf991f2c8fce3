import { describe, it, expect } from 'vitest';
import {
    addTriangleAxial,
    createTriangleCube,
    formatTriangle,
    isTriangleUpward,
    isValidTriangle,
    subtractTriangleCube,
    triangleAxial,
    triangleCube,
    triangleEquals,
    triangleHash,
    triangleKey,
    triangleOffset,
    triangleOrientation,
} from '@/grid/triangle/triangle-coordinates';
import {
    convertTriangle,
    toTriangleAxial,
    toTriangleCube,
    toTriangleOffset,
    triangleAxialToOffset,
    triangleOffsetToAxial,
} from '@/grid/triangle/triangle-conversion';
import { hexAxial, hexKey } from '@/grid/hex/hex-coordinates';
import { createGridSettings } from '@/grid/grid-settings';
import { expectFailure, expectSuccess, gridPairs } from '../grid-helpers/grid-samples';

describe('Triangle coordinates', () => {
    describe('orientation', () => {
        it('should point up when q + r is even', () => {
            expect(isTriangleUpward(triangleAxial(0, 0))).toBe(true);
            expect(isTriangleUpward(triangleAxial(1, 0))).toBe(false);
            expect(isTriangleUpward(triangleAxial(-1, 0))).toBe(false);
            expect(isTriangleUpward(triangleAxial(1, 1))).toBe(true);
            expect(triangleOrientation(triangleAxial(0, -3))).toBe('down');
        });

        it('should agree across every representation of a cell', () => {
            for (const [q, r] of gridPairs(-8, 8)) {
                const axial = triangleAxial(q, r);
                const upward = isTriangleUpward(axial);
                expect(isTriangleUpward(toTriangleCube(axial))).toBe(upward);
                expect(isTriangleUpward(toTriangleOffset(axial))).toBe(upward);
                expect(isTriangleUpward(toTriangleCube(axial))).toBe(toTriangleCube(axial).y % 2 === 0);
            }
        });
    });

    describe('construction', () => {
        it('should check the cube invariant', () => {
            expect(expectSuccess(createTriangleCube(2, -1, -1))).toEqual(triangleCube(2, -1, -1));
            expectFailure(createTriangleCube(1, 1, 0), 'INVARIANT_VIOLATION');
            expect(isValidTriangle(triangleCube(1, 1, 0))).toBe(false);
        });

        it('should apply the bounding range', () => {
            const settings = createGridSettings({ minCoordinate: -2, maxCoordinate: 2 });
            expect(isValidTriangle(triangleOffset(2, 0), settings)).toBe(true);
            expect(isValidTriangle(triangleOffset(3, 0), settings)).toBe(false);
            expect(isValidTriangle(triangleAxial(-3, 0), settings)).toBe(false);
        });

        it('should bound the derived cube axis, not just the stored components', () => {
            // cube (10000, -20000, 10000)
            expect(isValidTriangle(triangleAxial(10000, 10000))).toBe(false);
            // axial (10000, 1), cube y = -10001
            expect(isValidTriangle(triangleOffset(10000, 1))).toBe(false);
            expect(isValidTriangle(triangleAxial(10000, -10000))).toBe(true);
        });

        it('should give every representation of a cell the validity of its cube near the bounds', () => {
            const edge = [-10001, -10000, -9999, -1, 0, 1, 9999, 10000, 10001];
            for (const q of edge) {
                for (const r of edge) {
                    const axial = triangleAxial(q, r);
                    const expected = Math.max(Math.abs(q), Math.abs(r), Math.abs(q + r)) <= 10000;
                    for (const form of [axial, toTriangleCube(axial), toTriangleOffset(axial)]) {
                        expect(isValidTriangle(form)).toBe(expected);
                    }
                }
            }
        });
    });

    describe('conversion', () => {
        it('should convert known values', () => {
            expect(toTriangleCube(triangleAxial(2, -1))).toEqual(triangleCube(2, -1, -1));
            expect(triangleAxialToOffset(triangleAxial(1, 3))).toEqual(triangleOffset(2, 3));
            expect(triangleAxialToOffset(triangleAxial(0, -1))).toEqual(triangleOffset(-1, -1));
            expect(triangleOffsetToAxial(triangleOffset(-1, -1))).toEqual(triangleAxial(0, -1));
            expect(convertTriangle(triangleCube(2, -1, -1), 'offset')).toEqual(triangleOffset(1, -1));
        });

        it('should round-trip offsets and cubes in [-50, 50]', () => {
            for (const [a, b] of gridPairs(-50, 50)) {
                const offset = triangleOffset(a, b);
                expect(toTriangleOffset(toTriangleAxial(offset))).toEqual(offset);
                const axial = triangleAxial(a, b);
                const cube = toTriangleCube(axial);
                expect(cube.x + cube.y + cube.z).toBe(0);
                expect(toTriangleAxial(cube)).toEqual(axial);
            }
        });
    });

    describe('equality, hash, key and string form', () => {
        it('should compare structurally including the kind', () => {
            expect(triangleEquals(triangleAxial(1, 0), triangleAxial(1, 0))).toBe(true);
            expect(triangleEquals(triangleAxial(1, 0), triangleOffset(1, 0))).toBe(false);
            expect(triangleHash(triangleAxial(3, 4))).toBe(triangleHash(triangleAxial(3, 4)));
        });

        it('should keep keys apart from hex keys', () => {
            expect(triangleKey(triangleAxial(1, 0))).toBe('triangle-axial:1,0');
            expect(triangleKey(triangleAxial(1, 0))).not.toBe(hexKey(hexAxial(1, 0)));
            expect(triangleKey(triangleCube(2, -1, -1))).toBe('triangle-cube:2,-1,-1');
        });

        it('should format with the orientation', () => {
            expect(formatTriangle(triangleAxial(1, 0))).toBe('TriangleAxial(1, 0) [Down]');
            expect(formatTriangle(triangleOffset(2, 3))).toBe('TriangleOffset(2, 3) [Up]');
            expect(formatTriangle(triangleCube(0, 0, 0))).toBe('TriangleCube(0, 0, 0) [Up]');
        });

        it('should add and subtract', () => {
            expect(addTriangleAxial(triangleAxial(1, 2), triangleAxial(-3, 1))).toEqual(triangleAxial(-2, 3));
            expect(subtractTriangleCube(triangleCube(1, -1, 0), triangleCube(1, -1, 0))).toEqual(triangleCube(0, 0, 0));
        });
    });
});
