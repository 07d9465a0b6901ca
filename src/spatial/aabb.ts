/**
 * AABB capability
 *
 * Anything with a position (x, y) and an extent (w, h) in world units can be
 * stored in or used to probe the grid hash.
 */

export interface AABB {
    readonly x: number;
    readonly y: number;
    readonly w: number;
    readonly h: number;
}

const AABB_FIELDS = ['x', 'y', 'w', 'h'] as const;

/**
 * Exact overlap test for two AABBs. Touching edges count as overlap.
 * Meant for the narrow filter callers run on broad-phase candidates.
 */
export function aabbOverlap(a: AABB, b: AABB): boolean {
    return a.x <= b.x + b.w && a.x + a.w >= b.x &&
           a.y <= b.y + b.h && a.y + a.h >= b.y;
}

/**
 * Returns the reason an AABB is unusable, or null if it is well-formed.
 */
export function describeMalformedAABB(value: unknown): string | null {
    if (typeof value !== 'object' || value === null) {
        return 'not an object';
    }
    const fields = { x: 0, y: 0, w: 0, h: 0 };
    for (const field of AABB_FIELDS) {
        const v: unknown = Reflect.get(value, field);
        if (typeof v !== 'number') return `field '${field}' is missing or not a number`;
        if (!Number.isFinite(v)) return `field '${field}' is not finite (${v})`;
        fields[field] = v;
    }
    if (fields.w < 0) return `negative width (${fields.w})`;
    if (fields.h < 0) return `negative height (${fields.h})`;
    return null;
}
