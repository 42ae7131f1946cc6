import { LogHandler } from '@/utilities/log-handler';
import {
    GridCoord,
    NeighborOffsets,
    VON_NEUMANN_OFFSETS,
    MOORE_OFFSETS,
    SECOND_RING_OFFSETS,
    EXTENDED_MOORE_OFFSETS,
} from './coordinates';
import { GridError, GridErrorKind } from './grid-error';
import { floorMod, MAX_GRID_CELLS } from './grid-math';

/**
 * Translates between (x, y) grid coordinates and row-major flat indices
 * on a toroidal grid: both axes wrap, so every integer coordinate maps
 * to a cell and moving past an edge re-enters from the opposite one.
 *
 * The indexer holds no cell data. Callers keep their per-cell attributes
 * in flat arrays of length `size` and use the indices computed here:
 *
 * ```typescript
 * const grid = new GridIndexer(64, 48);
 * const height = new Uint8Array(grid.size);
 * height[grid.toIndex(-1, 0)] = 10;           // column 63, row 0
 * const right = grid.shift(grid.toIndex(63, 0), 1, 0); // wraps to column 0
 * ```
 *
 * Instances are immutable; build a new one to change dimensions.
 */
export class GridIndexer {
    private static log = new LogHandler('GridIndexer');

    /** Number of columns */
    public readonly width: number;
    /** Number of rows */
    public readonly height: number;
    /** Number of cells, i.e. the flat buffer length this indexer is valid for */
    public readonly size: number;

    /**
     * @throws GridError InvalidDimension when width or height is not a positive integer,
     *   Overflow when width * height exceeds MAX_GRID_CELLS
     */
    constructor(width: number, height: number) {
        GridIndexer.requireDimension('width', width);
        GridIndexer.requireDimension('height', height);

        const size = width * height;
        if (size > MAX_GRID_CELLS) {
            GridIndexer.fail(
                GridErrorKind.Overflow,
                `grid of ${width}x${height} exceeds ${MAX_GRID_CELLS} cells`
            );
        }

        this.width = width;
        this.height = height;
        this.size = size;

        Object.freeze(this);
        GridIndexer.log.debug('created ' + this.toString());
    }

    /**
     * Build an indexer from its width and total cell count.
     * `size` must be an exact multiple of `width`; the height is `size / width`.
     */
    public static fromWidthAndSize(width: number, size: number): GridIndexer {
        GridIndexer.requireDimension('width', width);
        GridIndexer.requireDimension('size', size);

        if (size > MAX_GRID_CELLS) {
            GridIndexer.fail(GridErrorKind.Overflow, `size ${size} exceeds ${MAX_GRID_CELLS} cells`);
        }
        if (size % width !== 0) {
            GridIndexer.fail(
                GridErrorKind.InvalidDimension,
                `size ${size} is not a multiple of width ${width}`
            );
        }

        return new GridIndexer(width, size / width);
    }

    /** Column of x after wrapping, in [0, width) */
    public wrapX(x: number): number {
        GridIndexer.requireInteger('x', x);
        return floorMod(x, this.width);
    }

    /** Row of y after wrapping, in [0, height) */
    public wrapY(y: number): number {
        GridIndexer.requireInteger('y', y);
        return floorMod(y, this.height);
    }

    /** Flat index of (x, y). Any integer coordinates are accepted and wrapped on each axis. */
    public toIndex(x: number, y: number): number {
        return this.wrapY(y) * this.width + this.wrapX(x);
    }

    /**
     * Grid position of a flat index.
     * @throws GridError IndexOutOfRange unless 0 <= index < size
     */
    public toCoords(index: number): GridCoord {
        this.requireIndex(index);
        // + 0 turns an index of -0 into 0
        const cell = index + 0;
        const x = cell % this.width;
        return { x, y: (cell - x) / this.width };
    }

    /**
     * Flat index of the cell offset by (dx, dy) from (x, y).
     * Same result as toIndex(x + dx, y + dy), for deltas of any size or sign.
     */
    public neighborIndex(x: number, y: number, dx: number, dy: number): number {
        GridIndexer.requireInteger('dx', dx);
        GridIndexer.requireInteger('dy', dy);
        const nx = wrapSum(this.wrapX(x), floorMod(dx, this.width), this.width);
        const ny = wrapSum(this.wrapY(y), floorMod(dy, this.height), this.height);
        return ny * this.width + nx;
    }

    /**
     * Flat index of the cell offset by (dx, dy) from the cell at `index`.
     * @throws GridError IndexOutOfRange unless 0 <= index < size
     */
    public shift(index: number, dx: number, dy: number): number {
        this.requireIndex(index);
        GridIndexer.requireInteger('dx', dx);
        GridIndexer.requireInteger('dy', dy);
        return this.offsetFrom(index + 0, dx, dy);
    }

    /**
     * Indices of the cells at the given offsets from `index`, in offset order.
     * Pass `out` to reuse an array across calls; it is cleared first.
     * All offsets are checked before `out` is touched, so a bad offset leaves it as it was.
     */
    public neighbors(index: number, offsets: NeighborOffsets, out: number[] = []): number[] {
        this.requireIndex(index);
        for (const [dx, dy] of offsets) {
            GridIndexer.requireInteger('dx', dx);
            GridIndexer.requireInteger('dy', dy);
        }

        out.length = 0;
        for (const [dx, dy] of offsets) {
            out.push(this.offsetFrom(index + 0, dx, dy));
        }
        return out;
    }

    /** The 4 orthogonal neighbors: right, up, left, down */
    public neighbors4(index: number): number[] {
        return this.neighbors(index, VON_NEUMANN_OFFSETS);
    }

    public neighbors4At(x: number, y: number): number[] {
        return this.neighbors4(this.toIndex(x, y));
    }

    /** The 8 surrounding cells, counter-clockwise from the right */
    public neighbors8(index: number): number[] {
        return this.neighbors(index, MOORE_OFFSETS);
    }

    public neighbors8At(x: number, y: number): number[] {
        return this.neighbors8(this.toIndex(x, y));
    }

    /** The 16 cells two steps away, counter-clockwise from the second cell to the right */
    public neighbors16(index: number): number[] {
        return this.neighbors(index, SECOND_RING_OFFSETS);
    }

    public neighbors16At(x: number, y: number): number[] {
        return this.neighbors16(this.toIndex(x, y));
    }

    /** neighbors8 followed by neighbors16 */
    public neighbors24(index: number): number[] {
        return this.neighbors(index, EXTENDED_MOORE_OFFSETS);
    }

    public neighbors24At(x: number, y: number): number[] {
        return this.neighbors24(this.toIndex(x, y));
    }

    /** True if `index` addresses a cell of this grid */
    public isValidIndex(index: number): boolean {
        return Number.isInteger(index) && index >= 0 && index < this.size;
    }

    public toString(): string {
        return `GridIndexer(${this.width}x${this.height})`;
    }

    /** shift without argument checks; index must be valid and not -0 */
    private offsetFrom(index: number, dx: number, dy: number): number {
        const x = index % this.width;
        const y = (index - x) / this.width;
        const nx = wrapSum(x, floorMod(dx, this.width), this.width);
        const ny = wrapSum(y, floorMod(dy, this.height), this.height);
        return ny * this.width + nx;
    }

    private requireIndex(index: number): void {
        if (!this.isValidIndex(index)) {
            throw new GridError(
                GridErrorKind.IndexOutOfRange,
                `index ${index} out of range [0, ${this.size})`
            );
        }
    }

    private static requireDimension(name: string, value: number): void {
        if (!Number.isInteger(value) || value < 1) {
            GridIndexer.fail(
                GridErrorKind.InvalidDimension,
                `${name} must be a positive integer, got ${value}`
            );
        }
    }

    private static requireInteger(name: string, value: number): void {
        if (!Number.isInteger(value)) {
            throw new GridError(GridErrorKind.InvalidCoordinate, `${name} must be an integer, got ${value}`);
        }
    }

    /** Construction failures are logged; per-call lookups only throw */
    private static fail(kind: GridErrorKind, msg: string): never {
        GridIndexer.log.warn(msg);
        throw new GridError(kind, msg);
    }
}

/** (a + b) mod m for a, b already in [0, m) */
function wrapSum(a: number, b: number, m: number): number {
    const sum = a + b;
    return sum >= m ? sum - m : sum;
}
