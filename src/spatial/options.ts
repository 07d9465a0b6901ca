/**
 * Grid Hash Options
 */

import { InvalidConfigurationError } from './errors';

/**
 * How world coordinates become cell coordinates.
 * - `floor`: cell -1 starts at -spacing (consistent on both sides of zero)
 * - `truncate`: rounds toward zero, so cell 0 is twice as wide around the origin
 */
export type CellRounding = 'floor' | 'truncate';

export interface GridHashOptions {
    /** World-unit edge length of one square cell */
    spacing: number;
    /** Maximum (entity, cell) memberships per population */
    maxEntries: number;
    cellRounding?: CellRounding;
    /** Log a summary of every population to the console */
    debug?: boolean;
}

export type ResolvedGridHashOptions = Required<GridHashOptions>;

export const DEFAULT_GRID_HASH_OPTIONS: Pick<ResolvedGridHashOptions, 'cellRounding' | 'debug'> = {
    cellRounding: 'floor',
    debug: false,
};

/** Keeps `2 * maxEntries + 1` offsets addressable by an Int32Array */
export const MAX_GRID_ENTRIES = 0x3FFFFFFF;

const CELL_ROUNDINGS: readonly CellRounding[] = ['floor', 'truncate'];

function isCellRounding(value: unknown): value is CellRounding {
    return CELL_ROUNDINGS.some(r => r === value);
}

/**
 * Apply defaults and validate. Throws InvalidConfigurationError on the first bad option.
 */
export function resolveGridHashOptions(options: GridHashOptions): ResolvedGridHashOptions {
    const { spacing, maxEntries } = options;

    if (typeof spacing !== 'number' || !Number.isFinite(spacing) || spacing <= 0) {
        throw new InvalidConfigurationError('spacing', spacing, 'a finite number > 0');
    }
    if (!Number.isSafeInteger(maxEntries) || maxEntries <= 0 || maxEntries > MAX_GRID_ENTRIES) {
        throw new InvalidConfigurationError('maxEntries', maxEntries, `a positive integer <= ${MAX_GRID_ENTRIES}`);
    }

    const cellRounding = options.cellRounding ?? DEFAULT_GRID_HASH_OPTIONS.cellRounding;
    if (!isCellRounding(cellRounding)) {
        throw new InvalidConfigurationError('cellRounding', cellRounding, `one of ${CELL_ROUNDINGS.join(', ')}`);
    }

    return {
        spacing,
        maxEntries,
        cellRounding,
        debug: options.debug ?? DEFAULT_GRID_HASH_OPTIONS.debug,
    };
}
