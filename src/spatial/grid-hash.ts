/**
 * Grid Hash - fixed-capacity broad phase
 *
 * A uniform grid whose cells are hashed into a fixed number of buckets.
 * Memberships are bucketed with a counting sort into two preallocated arrays:
 * - `cellStarts`: offset into `cellEntries` where each bucket begins
 * - `cellEntries`: stored values, contiguous per bucket
 *
 * Usage, once per frame:
 * 1. `populate(entities)` (or `populateWith`) with every live AABB
 * 2. `query(probe, visit)` for collision candidates, then run an exact test
 *    on each. Candidates can repeat; use `queryUnique` if that matters.
 *
 * Population rebuilds everything. Don't populate from inside a query visitor.
 */

import { type AABB, describeMalformedAABB } from './aabb';
import { type CellRange, cellRange, cellSpan, forEachCell } from './cells';
import { CapacityExceededError, MalformedEntityError } from './errors';
import { type CellRounding, type GridHashOptions, type ResolvedGridHashOptions, resolveGridHashOptions } from './options';

export type GridHashPhase = 'empty' | 'populated';

export interface GridHashStats {
    membershipCount: number;
    occupiedBuckets: number;
    maxPerBucket: number;
    avgPerBucket: number;
}

/** Copy of the internal arrays, for inspection and tests */
export interface GridHashLayout<T> {
    cellStarts: number[];
    cellEntries: Array<T | undefined>;
}

export class GridHash<T> {
    private readonly options: ResolvedGridHashOptions;
    private readonly _cellCount: number;

    // Front buffers are what queries read. Population writes the back
    // buffers and swaps them in only once it has fully succeeded.
    private cellStarts: Int32Array;
    private cellEntries: Array<T | undefined>;
    private backStarts: Int32Array;
    private backEntries: Array<T | undefined>;

    private _phase: GridHashPhase = 'empty';
    private _membershipCount = 0;

    constructor(options: GridHashOptions) {
        this.options = resolveGridHashOptions(options);
        this._cellCount = 2 * this.options.maxEntries;

        this.cellStarts = new Int32Array(this._cellCount + 1);
        this.cellEntries = new Array<T | undefined>(this.options.maxEntries).fill(undefined);
        this.backStarts = new Int32Array(this._cellCount + 1);
        this.backEntries = new Array<T | undefined>(this.options.maxEntries).fill(undefined);
    }

    get spacing(): number {
        return this.options.spacing;
    }

    get maxEntries(): number {
        return this.options.maxEntries;
    }

    /** Number of buckets (twice the capacity, to thin out collisions) */
    get cellCount(): number {
        return this._cellCount;
    }

    get cellRounding(): CellRounding {
        return this.options.cellRounding;
    }

    get phase(): GridHashPhase {
        return this._phase;
    }

    /** (entity, cell) memberships stored by the last successful population */
    get membershipCount(): number {
        return this._membershipCount;
    }

    // ============================================
    // Population
    // ============================================

    /**
     * Rebuild the hash, storing the entities themselves.
     */
    populate(entities: Iterable<T & AABB>): void {
        this.rebuild(entities, entity => entity);
    }

    /**
     * Rebuild the hash, storing `transform(entity)` instead of the entity.
     * `transform` runs once per (entity, cell) membership, so an entity
     * spanning several cells is transformed several times.
     */
    populateWith<E extends AABB>(entities: Iterable<E>, transform: (entity: E) => T): void {
        this.rebuild(entities, transform);
    }

    private rebuild<E extends AABB>(entities: Iterable<E>, transform: (entity: E) => T): void {
        const batch: readonly E[] = Array.isArray(entities) ? entities : Array.from(entities);
        const ranges = this.measure(batch);

        const starts = this.backStarts;
        const entries = this.backEntries;
        const cellCount = this._cellCount;

        starts.fill(0);
        entries.fill(undefined);

        // Count memberships per bucket
        for (const range of ranges) {
            forEachCell(range, cellCount, bucket => {
                starts[bucket]++;
            });
        }

        // Running totals: starts[i] becomes the end of bucket i
        let total = 0;
        for (let i = 0; i < cellCount; i++) {
            total += starts[i];
            starts[i] = total;
        }
        starts[cellCount] = total;

        // Scatter, walking each bucket's offset back down to its start.
        // Entries within a bucket end up in reverse insertion order.
        for (let i = 0; i < batch.length; i++) {
            const entity = batch[i];
            forEachCell(ranges[i], cellCount, bucket => {
                entries[--starts[bucket]] = transform(entity);
            });
        }

        this.backStarts = this.cellStarts;
        this.backEntries = this.cellEntries;
        this.cellStarts = starts;
        this.cellEntries = entries;
        this._membershipCount = total;
        this._phase = 'populated';

        if (this.options.debug) {
            const stats = this.getStats();
            console.log(
                `[GridHash] populated ${batch.length} entities: ${total}/${this.options.maxEntries} memberships, ` +
                `${stats.occupiedBuckets}/${cellCount} buckets occupied, max ${stats.maxPerBucket} per bucket`
            );
        }
    }

    /**
     * Validate the batch and compute each entity's cell range.
     * Throws before any buffer is touched.
     */
    private measure(batch: readonly AABB[]): CellRange[] {
        const { spacing, cellRounding, maxEntries } = this.options;
        const ranges: CellRange[] = new Array(batch.length);
        let required = 0;

        for (let i = 0; i < batch.length; i++) {
            const reason = describeMalformedAABB(batch[i]);
            if (reason !== null) {
                throw new MalformedEntityError(i, reason);
            }
            const range = cellRange(batch[i], spacing, cellRounding);
            required += cellSpan(range);
            if (required > maxEntries) {
                if (this.options.debug) {
                    console.warn(`[GridHash] capacity exceeded at entity ${i} of ${batch.length} (maxEntries=${maxEntries})`);
                }
                throw new CapacityExceededError(maxEntries, required);
            }
            ranges[i] = range;
        }

        return ranges;
    }

    // ============================================
    // Queries
    // ============================================

    /**
     * Visit every value stored in the buckets `probe` covers.
     * Values repeat when they share several of those buckets, and values from
     * unrelated cells that hash to the same bucket show up too.
     */
    query(probe: AABB, visit: (candidate: T) => void): void {
        const starts = this.cellStarts;
        const entries = this.cellEntries;

        this.forEachProbeBucket(probe, bucket => {
            const end = starts[bucket + 1];
            for (let i = starts[bucket]; i < end; i++) {
                const candidate = entries[i];
                if (candidate === undefined) continue;
                visit(candidate);
            }
        });
    }

    /**
     * Like query(), but each distinct value is visited once.
     */
    queryUnique(probe: AABB, visit: (candidate: T) => void): void {
        const seen = new Set<T>();
        this.query(probe, candidate => {
            if (seen.has(candidate)) return;
            seen.add(candidate);
            visit(candidate);
        });
    }

    /**
     * Collect candidates into an array.
     * For hot loops, prefer query()/queryUnique() to avoid the allocation.
     */
    getCandidates(probe: AABB, unique: boolean = false): T[] {
        const result: T[] = [];
        const push = (candidate: T) => {
            result.push(candidate);
        };
        if (unique) {
            this.queryUnique(probe, push);
        } else {
            this.query(probe, push);
        }
        return result;
    }

    /**
     * A probe spanning more cells than there are buckets covers every bucket
     * at least once, so it visits each bucket exactly once instead.
     */
    private forEachProbeBucket(probe: AABB, visit: (bucket: number) => void): void {
        const reason = describeMalformedAABB(probe);
        if (reason !== null) {
            throw new MalformedEntityError(-1, reason);
        }

        const range = cellRange(probe, this.options.spacing, this.options.cellRounding);
        if (cellSpan(range) > this._cellCount) {
            for (let bucket = 0; bucket < this._cellCount; bucket++) {
                visit(bucket);
            }
            return;
        }
        forEachCell(range, this._cellCount, visit);
    }

    // ============================================
    // Inspection
    // ============================================

    /**
     * Get bucket occupancy statistics for debugging.
     */
    getStats(): GridHashStats {
        let occupiedBuckets = 0;
        let maxPerBucket = 0;

        for (let i = 0; i < this._cellCount; i++) {
            const size = this.cellStarts[i + 1] - this.cellStarts[i];
            if (size > 0) {
                occupiedBuckets++;
                maxPerBucket = Math.max(maxPerBucket, size);
            }
        }

        return {
            membershipCount: this._membershipCount,
            occupiedBuckets,
            maxPerBucket,
            avgPerBucket: occupiedBuckets > 0 ? this._membershipCount / occupiedBuckets : 0,
        };
    }

    getLayout(): GridHashLayout<T> {
        return {
            cellStarts: Array.from(this.cellStarts),
            cellEntries: this.cellEntries.slice(),
        };
    }
}

export function createGridHash<T>(options: GridHashOptions): GridHash<T> {
    return new GridHash<T>(options);
}
