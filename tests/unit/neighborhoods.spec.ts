import { describe, it, expect } from 'vitest';
import {
    GridIndexer,
    GridErrorKind,
    isGridError,
    VON_NEUMANN_OFFSETS,
    MOORE_OFFSETS,
    SECOND_RING_OFFSETS,
    EXTENDED_MOORE_OFFSETS,
} from '@/grid';

describe('neighborhood offsets', () => {
    it('should have the expected sizes', () => {
        expect(VON_NEUMANN_OFFSETS).toHaveLength(4);
        expect(MOORE_OFFSETS).toHaveLength(8);
        expect(SECOND_RING_OFFSETS).toHaveLength(16);
        expect(EXTENDED_MOORE_OFFSETS).toHaveLength(24);
    });

    it('should place every second-ring offset at Chebyshev distance 2', () => {
        for (const [dx, dy] of SECOND_RING_OFFSETS) {
            expect(Math.max(Math.abs(dx), Math.abs(dy))).toBe(2);
        }
        const keys = new Set(SECOND_RING_OFFSETS.map(([dx, dy]) => dx + ',' + dy));
        expect(keys.size).toBe(16);
    });

    it('should list the Moore ring first in the extended neighborhood', () => {
        expect(EXTENDED_MOORE_OFFSETS.slice(0, 8)).toEqual(MOORE_OFFSETS);
        expect(EXTENDED_MOORE_OFFSETS.slice(8)).toEqual(SECOND_RING_OFFSETS);
    });
});

describe('GridIndexer neighborhoods', () => {
    // (0, 0) is the corner, (5, 9) sits on the last row
    const grid = new GridIndexer(10, 10);

    describe('neighbors4', () => {
        it('should list right, up, left, down with wrapping', () => {
            expect(grid.neighbors4(0)).toEqual([1, 10, 9, 90]);
            expect(grid.neighbors4(95)).toEqual([96, 5, 94, 85]);
        });

        it('should wrap the start coordinates in the At variant', () => {
            expect(grid.neighbors4At(-10, 10)).toEqual(grid.neighbors4(0));
        });
    });

    describe('neighbors8', () => {
        it('should list the Moore ring counter-clockwise from the right', () => {
            expect(grid.neighbors8(0)).toEqual([1, 11, 10, 19, 9, 99, 90, 91]);
            expect(grid.neighbors8(95)).toEqual([96, 6, 5, 4, 94, 84, 85, 86]);
        });

        it('should match the At variant', () => {
            expect(grid.neighbors8At(5, -1)).toEqual(grid.neighbors8(95));
        });
    });

    describe('neighbors16', () => {
        it('should list the second ring counter-clockwise from two cells right', () => {
            expect(grid.neighbors16(95)).toEqual([97, 7, 17, 16, 15, 14, 13, 3, 93, 83, 73, 74, 75, 76, 77, 87]);
            expect(grid.neighbors16(0)).toEqual([2, 12, 22, 21, 20, 29, 28, 18, 8, 98, 88, 89, 80, 81, 82, 92]);
        });

        it('should match the At variant', () => {
            expect(grid.neighbors16At(15, 19)).toEqual(grid.neighbors16(95));
        });
    });

    describe('neighbors24', () => {
        it('should list the Moore ring followed by the second ring', () => {
            expect(grid.neighbors24(95)).toEqual([
                96, 6, 5, 4, 94, 84, 85, 86,
                97, 7, 17, 16, 15, 14, 13, 3, 93, 83, 73, 74, 75, 76, 77, 87,
            ]);
            expect(grid.neighbors24(0)).toEqual([
                1, 11, 10, 19, 9, 99, 90, 91,
                2, 12, 22, 21, 20, 29, 28, 18, 8, 98, 88, 89, 80, 81, 82, 92,
            ]);
        });

        it('should give 24 distinct cells other than the start on a 10x10 grid', () => {
            for (const start of [0, 9, 45, 90, 99]) {
                const result = grid.neighbors24(start);
                expect(new Set(result).size).toBe(24);
                expect(result).not.toContain(start);
            }
        });

        it('should match the At variant', () => {
            expect(grid.neighbors24At(0, 0)).toEqual(grid.neighbors24(0));
        });
    });

    describe('neighbors', () => {
        it('should fill and return the given buffer', () => {
            const out = [42, 43, 44, 45, 46, 47];
            const result = grid.neighbors(0, VON_NEUMANN_OFFSETS, out);

            expect(result).toBe(out);
            expect(out).toEqual([1, 10, 9, 90]);
        });

        it('should leave the buffer untouched when an offset is not an integer', () => {
            const out = [9, 9, 9];
            let caught: unknown;
            try {
                grid.neighbors(0, [[1, 0], [0.5, 0]], out);
            } catch (e) {
                caught = e;
            }

            expect(isGridError(caught, GridErrorKind.InvalidCoordinate)).toBe(true);
            expect(out).toEqual([9, 9, 9]);
        });

        it('should accept custom offsets', () => {
            expect(grid.neighbors(0, [[3, 0], [0, -3], [-11, 21]])).toEqual([3, 70, 19]);
        });

        it('should repeat cells on grids smaller than the neighborhood', () => {
            expect(new GridIndexer(1, 1).neighbors8(0)).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
            expect(new GridIndexer(2, 1).neighbors4(0)).toEqual([1, 0, 1, 0]);
        });

        it('should reject a start index outside the grid', () => {
            let caught: unknown;
            try {
                grid.neighbors8(100);
            } catch (e) {
                caught = e;
            }
            expect(isGridError(caught, GridErrorKind.IndexOutOfRange)).toBe(true);
        });
    });
});
