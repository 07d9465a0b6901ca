/**
 * Cell enumeration and hashing
 *
 * An AABB covers the inclusive rectangle of cells between the cells of its
 * two corners (x, y) and (x + w, y + h). Each cell maps to one of
 * `cellCount` buckets; distinct cells may share a bucket.
 */

import type { AABB } from './aabb';
import type { CellRounding } from './options';

export const HASH_PRIME_X = 9283711;
export const HASH_PRIME_Y = 689287499;

/** Inclusive cell coordinate bounds */
export interface CellRange {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
}

export function cellCoordinate(c: number, spacing: number, rounding: CellRounding): number {
    const q = c / spacing;
    // `+ 0` folds -0 from truncation into 0
    return (rounding === 'floor' ? Math.floor(q) : Math.trunc(q)) + 0;
}

export function cellRange(aabb: AABB, spacing: number, rounding: CellRounding): CellRange {
    return {
        minX: cellCoordinate(aabb.x, spacing, rounding),
        minY: cellCoordinate(aabb.y, spacing, rounding),
        maxX: cellCoordinate(aabb.x + aabb.w, spacing, rounding),
        maxY: cellCoordinate(aabb.y + aabb.h, spacing, rounding),
    };
}

/**
 * Number of cells in a range. May exceed 2^53 for absurd extents;
 * callers only compare it against capacity.
 */
export function cellSpan(range: CellRange): number {
    return (range.maxX - range.minX + 1) * (range.maxY - range.minY + 1);
}

const TWO_POW_32 = 2 ** 32;

/**
 * XOR of two integers as if both were unbounded two's-complement values.
 * Exact while both operands are safe integers.
 */
function xorSafe(a: number, b: number): number {
    const aHi = Math.floor(a / TWO_POW_32);
    const bHi = Math.floor(b / TWO_POW_32);
    const lo = ((a - aHi * TWO_POW_32) ^ (b - bHi * TWO_POW_32)) >>> 0;
    return (aHi ^ bHi) * TWO_POW_32 + lo;
}

/**
 * Bucket index of a cell: `abs((cx * 9283711) ^ (cy * 689287499)) % cellCount`
 * on exact integers. Products past 2^53 go through BigInt.
 * Folding the sign away with abs biases the distribution slightly,
 * which is fine for a broad phase.
 */
export function hashCell(cx: number, cy: number, cellCount: number): number {
    const px = cx * HASH_PRIME_X;
    const py = cy * HASH_PRIME_Y;
    if (Number.isSafeInteger(px) && Number.isSafeInteger(py)) {
        return Math.abs(xorSafe(px, py)) % cellCount;
    }

    let h = (BigInt(cx) * BigInt(HASH_PRIME_X)) ^ (BigInt(cy) * BigInt(HASH_PRIME_Y));
    if (h < 0n) h = -h;
    return Number(h % BigInt(cellCount));
}

/**
 * Visit the bucket of every cell in the range, x-major.
 * Loops count offsets rather than coordinates so cell coordinates past 2^53,
 * where `c + 1 === c`, still terminate.
 */
export function forEachCell(range: CellRange, cellCount: number, visit: (bucket: number) => void): void {
    const width = range.maxX - range.minX;
    const height = range.maxY - range.minY;
    for (let i = 0; i <= width; i++) {
        const cx = range.minX + i;
        for (let j = 0; j <= height; j++) {
            visit(hashCell(cx, range.minY + j, cellCount));
        }
    }
}
