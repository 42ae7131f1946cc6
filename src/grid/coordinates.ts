/**
 * Grid coordinate types and neighborhood offsets.
 * This is a base module with no dependencies to avoid circular imports.
 *
 * Offset tables are [dx, dy] pairs ordered counter-clockwise, with +y
 * counted as "up", starting from the cell to the right.
 */

export interface GridCoord {
    x: number;
    y: number;
}

export type GridOffset = readonly [number, number];

/** Ordered list of [dx, dy] offsets describing a neighborhood */
export type NeighborOffsets = ReadonlyArray<GridOffset>;

/** 4 orthogonal neighbors: right, up, left, down */
export const VON_NEUMANN_OFFSETS: NeighborOffsets = [
    [1, 0], [0, 1], [-1, 0], [0, -1]
];

/** 8 surrounding cells */
export const MOORE_OFFSETS: NeighborOffsets = [
    [1, 0],    // right
    [1, 1],    // up-right
    [0, 1],    // up
    [-1, 1],   // up-left
    [-1, 0],   // left
    [-1, -1],  // down-left
    [0, -1],   // down
    [1, -1],   // down-right
];

/** 16 cells at Chebyshev distance 2, starting two cells to the right */
export const SECOND_RING_OFFSETS: NeighborOffsets = [
    [2, 0], [2, 1], [2, 2],
    [1, 2], [0, 2], [-1, 2], [-2, 2],
    [-2, 1], [-2, 0], [-2, -1], [-2, -2],
    [-1, -2], [0, -2], [1, -2], [2, -2],
    [2, -1],
];

/** 24 nearest cells: the Moore ring, then the second ring */
export const EXTENDED_MOORE_OFFSETS: NeighborOffsets = [
    ...MOORE_OFFSETS,
    ...SECOND_RING_OFFSETS,
];
