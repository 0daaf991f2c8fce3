import { describe, it, expect } from 'vitest';
import {
    addHex,
    createHexCube,
    createHexDoubled,
    formatHex,
    getNearestValidDoubled,
    hexAxial,
    hexAxialFromVector,
    hexCube,
    hexDoubled,
    hexEquals,
    hexHash,
    hexKey,
    hexOffsetEvenQ,
    hexOffsetOddQ,
    hexToVector,
    isValidHex,
    negateHex,
    scaleHex,
    subtractHex,
    type HexCanonical,
} from '@/grid/hex/hex-coordinates';
import { toHexCube, toHexDoubled, toHexOffset } from '@/grid/hex/hex-conversion';
import { createGridSettings } from '@/grid/grid-settings';
import { expectFailure, expectSuccess, gridPairs } from '../grid-helpers/grid-samples';

describe('Hex coordinates', () => {
    describe('construction', () => {
        it('should accept a cube coordinate summing to zero', () => {
            expect(expectSuccess(createHexCube(1, -3, 2))).toEqual({ kind: 'cube', x: 1, y: -3, z: 2 });
        });

        it('should reject a cube coordinate that does not sum to zero', () => {
            expectFailure(createHexCube(1, 1, 1), 'INVARIANT_VIOLATION');
        });

        it('should report an unchecked invalid cube through isValidHex', () => {
            expect(isValidHex(hexCube(1, 1, 1))).toBe(false);
            expect(isValidHex(hexCube(1, -1, 0))).toBe(true);
        });

        it('should normalise negative zero', () => {
            const cube = hexCube(-0, 0, -0);
            expect(Object.is(cube.x, 0)).toBe(true);
            expect(Object.is(cube.z, 0)).toBe(true);
            expect(hexKey(hexAxial(-0, 0))).toBe('axial:0,0');
        });

        it('should build from and flatten to a vector', () => {
            expect(hexAxialFromVector({ x: 3, y: -2 })).toEqual(hexAxial(3, -2));
            expect(hexToVector(hexDoubled(4, -2))).toEqual({ x: 4, y: -2 });
        });
    });

    describe('doubled parity', () => {
        it('should accept even col + row and reject odd', () => {
            expect(isValidHex(hexDoubled(4, -2))).toBe(true);
            expect(isValidHex(hexDoubled(3, -2))).toBe(false);
            expectFailure(createHexDoubled(3, -2), 'INVARIANT_VIOLATION');
            expect(expectSuccess(createHexDoubled(-1, 3))).toEqual(hexDoubled(-1, 3));
        });

        it('should nudge the smaller-magnitude axis away from zero', () => {
            expect(getNearestValidDoubled(3, -2)).toEqual(hexDoubled(3, -3));
            expect(getNearestValidDoubled(1, 4)).toEqual(hexDoubled(2, 4));
            expect(getNearestValidDoubled(-1, 2)).toEqual(hexDoubled(-2, 2));
        });

        it('should move col on a magnitude tie', () => {
            expect(getNearestValidDoubled(0, 1)).toEqual(hexDoubled(1, 1));
        });

        it('should leave a valid coordinate unchanged', () => {
            expect(getNearestValidDoubled(4, -2)).toEqual(hexDoubled(4, -2));
        });

        it('should always produce a valid coordinate', () => {
            for (const [col, row] of gridPairs(-10, 10)) {
                expect(isValidHex(getNearestValidDoubled(col, row))).toBe(true);
            }
        });
    });

    describe('bounding range', () => {
        it('should reject coordinates outside the default range', () => {
            expect(isValidHex(hexAxial(10000, 0))).toBe(true);
            expect(isValidHex(hexAxial(10001, 0))).toBe(false);
        });

        it('should use the range from explicit settings', () => {
            const settings = createGridSettings({ minCoordinate: -20000, maxCoordinate: 20000 });
            expect(isValidHex(hexAxial(10001, 0), settings)).toBe(true);
        });

        it('should bound the derived cube axis, not just the stored components', () => {
            // cube (10000, -20000, 10000)
            expect(isValidHex(hexAxial(10000, 10000))).toBe(false);
            // cube (10000, -15000, 5000)
            expect(isValidHex(hexOffsetOddQ(10000, 10000))).toBe(false);
            // cube (10000, 0, -10000)
            expect(isValidHex(hexAxial(10000, -10000))).toBe(true);
            // row 20000 is outside the range, cube (0, -10000, 10000) is not
            expect(isValidHex(hexDoubled(0, 20000))).toBe(true);
        });

        it('should give every representation of a cell the validity of its cube near the bounds', () => {
            const edge = [-10001, -10000, -9999, -1, 0, 1, 9999, 10000, 10001];
            for (const q of edge) {
                for (const r of edge) {
                    const axial = hexAxial(q, r);
                    const expected = Math.max(Math.abs(q), Math.abs(r), Math.abs(q + r)) <= 10000;
                    expect(isValidHex(toHexCube(axial))).toBe(expected);
                    for (const form of [axial, toHexOffset(axial, 'odd-q'), toHexOffset(axial, 'even-q'), toHexDoubled(axial)]) {
                        expect(isValidHex(form)).toBe(expected);
                    }
                }
            }
        });
    });

    describe('equality, hash and key', () => {
        it('should compare structurally including the kind', () => {
            expect(hexEquals(hexAxial(1, 2), hexAxial(1, 2))).toBe(true);
            expect(hexEquals(hexAxial(1, 2), hexAxial(2, 1))).toBe(false);
            expect(hexEquals(hexAxial(1, -1), hexCube(1, 0, -1))).toBe(false);
            expect(hexEquals(hexOffsetOddQ(1, 1), hexOffsetEvenQ(1, 1))).toBe(false);
        });

        it('should hash equal coordinates equally', () => {
            expect(hexHash(hexAxial(5, -7))).toBe(hexHash(hexAxial(5, -7)));
        });

        it('should produce distinct unsigned 32-bit hashes over a small grid', () => {
            const hashes = new Set<number>();
            for (const [q, r] of gridPairs(-10, 10)) {
                const h = hexHash(hexAxial(q, r));
                expect(Number.isInteger(h)).toBe(true);
                expect(h).toBeGreaterThanOrEqual(0);
                expect(h).toBeLessThan(2 ** 32);
                hashes.add(h);
            }
            expect(hashes.size).toBe(441);
        });

        it('should build keys per kind and parity', () => {
            expect(hexKey(hexAxial(3, -2))).toBe('axial:3,-2');
            expect(hexKey(hexCube(3, -1, -2))).toBe('cube:3,-1,-2');
            expect(hexKey(hexOffsetOddQ(1, 2))).toBe('offset:1,1,2');
            expect(hexKey(hexOffsetEvenQ(1, 2))).toBe('offset:0,1,2');
            expect(hexKey(hexDoubled(4, -2))).toBe('doubled:4,-2');
        });

        it('should format each representation', () => {
            expect(formatHex(hexAxial(3, -2))).toBe('Axial(3, -2)');
            expect(formatHex(hexCube(1, -3, 2))).toBe('Cube(1, -3, 2)');
            expect(formatHex(hexOffsetOddQ(1, 2))).toBe('OffsetOddQ(1, 2)');
            expect(formatHex(hexOffsetEvenQ(1, 2))).toBe('OffsetEvenQ(1, 2)');
            expect(formatHex(hexDoubled(4, -2))).toBe('Doubled(4, -2)');
        });
    });

    describe('arithmetic', () => {
        it('should add, subtract, scale and negate axial coordinates', () => {
            expect(addHex(hexAxial(1, 2), hexAxial(3, -1))).toEqual(hexAxial(4, 1));
            expect(subtractHex(hexAxial(1, 2), hexAxial(3, -1))).toEqual(hexAxial(-2, 3));
            expect(scaleHex(hexAxial(1, -1), 3)).toEqual(hexAxial(3, -3));
            expect(negateHex(hexAxial(2, -1))).toEqual(hexAxial(-2, 1));
        });

        it('should keep the cube invariant under cube arithmetic', () => {
            const sum = addHex(hexCube(1, -1, 0), hexCube(0, 2, -2));
            expect(sum).toEqual(hexCube(1, 1, -2));
            expect(isValidHex(sum)).toBe(true);
            expect(scaleHex(hexCube(1, -1, 0), 3)).toEqual(hexCube(3, -3, 0));
            expect(negateHex(hexCube(0, 0, 0))).toEqual(hexCube(0, 0, 0));
        });

        it('should refuse to mix representations', () => {
            const mixed: HexCanonical[] = [hexAxial(1, 0), hexCube(1, -1, 0)];
            const [a, b] = mixed;
            expect(() => addHex(a, b)).toThrow(TypeError);
            expect(() => subtractHex(a, b)).toThrow('subtractHex needs two coordinates of the same kind, got axial and cube');
        });
    });
});
