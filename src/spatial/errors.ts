/**
 * Grid Hash Errors
 *
 * Every failure the grid hash reports is a GridHashError carrying a code,
 * so callers can branch on `error.code` without instanceof chains.
 */

export type GridHashErrorCode =
    | 'INVALID_CONFIGURATION'
    | 'CAPACITY_EXCEEDED'
    | 'MALFORMED_ENTITY';

export class GridHashError extends Error {
    readonly code: GridHashErrorCode;

    constructor(code: GridHashErrorCode, message: string) {
        super(`[GridHash] ${message}`);
        this.name = new.target.name;
        this.code = code;
    }
}

export class InvalidConfigurationError extends GridHashError {
    constructor(readonly option: string, readonly value: unknown, expected: string) {
        super('INVALID_CONFIGURATION', `Invalid option '${option}': expected ${expected}, got ${String(value)}`);
    }
}

/**
 * Thrown before anything is written when a population needs more
 * (entity, cell) memberships than the hash was sized for.
 * `required` is a lower bound: counting stops once capacity is passed.
 */
export class CapacityExceededError extends GridHashError {
    constructor(readonly capacity: number, readonly required: number) {
        super(
            'CAPACITY_EXCEEDED',
            `Capacity exceeded: population needs at least ${required} cell memberships (maxEntries=${capacity}). ` +
            `Increase maxEntries or the cell spacing.`
        );
    }
}

/** `index` is the entity's position in the populated batch, or -1 for a query probe. */
export class MalformedEntityError extends GridHashError {
    constructor(readonly index: number, readonly reason: string) {
        super(
            'MALFORMED_ENTITY',
            index >= 0 ? `Malformed entity at index ${index}: ${reason}` : `Malformed query probe: ${reason}`
        );
    }
}
