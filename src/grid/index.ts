/**
 * Grid Module
 *
 * Wrapping (toroidal) translation between grid coordinates and flat indices.
 * External code should only import from this file.
 *
 * Public API:
 * - Indexer: GridIndexer
 * - Types: GridCoord, GridOffset, NeighborOffsets
 * - Errors: GridError, GridErrorKind, isGridError
 * - Math: floorMod, MAX_GRID_CELLS
 * - Neighborhoods: VON_NEUMANN_OFFSETS, MOORE_OFFSETS, SECOND_RING_OFFSETS, EXTENDED_MOORE_OFFSETS
 */

export { GridIndexer } from './grid-indexer';

export type { GridCoord, GridOffset, NeighborOffsets } from './coordinates';
export {
    VON_NEUMANN_OFFSETS,
    MOORE_OFFSETS,
    SECOND_RING_OFFSETS,
    EXTENDED_MOORE_OFFSETS,
} from './coordinates';

export { GridError, GridErrorKind, isGridError } from './grid-error';

export { floorMod, MAX_GRID_CELLS } from './grid-math';
