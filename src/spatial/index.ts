/**
 * Spatial Module
 *
 * Fixed-capacity uniform-grid hash for broad-phase collision candidates.
 */

export type { AABB } from './aabb';
export { aabbOverlap, describeMalformedAABB } from './aabb';

export type { CellRange } from './cells';
export { HASH_PRIME_X, HASH_PRIME_Y, cellCoordinate, cellRange, cellSpan, hashCell, forEachCell } from './cells';

export type { CellRounding, GridHashOptions, ResolvedGridHashOptions } from './options';
export { DEFAULT_GRID_HASH_OPTIONS, MAX_GRID_ENTRIES, resolveGridHashOptions } from './options';

export type { GridHashErrorCode } from './errors';
export { GridHashError, InvalidConfigurationError, CapacityExceededError, MalformedEntityError } from './errors';

export type { GridHashPhase, GridHashStats, GridHashLayout } from './grid-hash';
export { GridHash, createGridHash } from './grid-hash';
