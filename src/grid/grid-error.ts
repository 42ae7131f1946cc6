export enum GridErrorKind {
    /** width, height or size is not a positive integer, or size is not a multiple of width */
    InvalidDimension,
    /** width * height exceeds MAX_GRID_CELLS */
    Overflow,
    /** flat index outside [0, size) */
    IndexOutOfRange,
    /** coordinate or delta is not an integer */
    InvalidCoordinate,
}

/** Thrown synchronously by GridIndexer at the offending call. */
export class GridError extends Error {
    public readonly kind: GridErrorKind;

    constructor(kind: GridErrorKind, msg: string) {
        super(msg);
        this.name = 'GridError';
        this.kind = kind;

        Object.seal(this);
    }
}

/** Narrow a caught value to a GridError, optionally of one kind */
export function isGridError(value: unknown, kind?: GridErrorKind): value is GridError {
    if (!(value instanceof GridError)) return false;
    return kind === undefined || value.kind === kind;
}
