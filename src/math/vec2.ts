/**
 * 2D Vector helpers
 *
 * Plain `{ x, y }` objects with free functions. Each operation returns a new
 * vector; the `...Into` variants write into `out` instead and return it, so
 * per-frame code can reuse scratch vectors. `out` may alias an input.
 */

export interface Vec2 {
    x: number;
    y: number;
}

export function vec2(x: number, y: number): Vec2 {
    return { x, y };
}

export function vec2Zero(): Vec2 {
    return { x: 0, y: 0 };
}

export function vec2Clone(v: Vec2): Vec2 {
    return { x: v.x, y: v.y };
}

/** angle in radians, measured from +x toward +y */
export function vec2FromPolar(angle: number, length: number = 1): Vec2 {
    return { x: length * Math.cos(angle), y: length * Math.sin(angle) };
}

export function vec2ToPolar(v: Vec2): { angle: number; length: number } {
    return { angle: vec2Angle(v), length: vec2Length(v) };
}

// ============================================
// Componentwise arithmetic
// ============================================

export function vec2Add(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x + b.x, y: a.y + b.y };
}

export function vec2AddInto(out: Vec2, a: Vec2, b: Vec2): Vec2 {
    out.x = a.x + b.x;
    out.y = a.y + b.y;
    return out;
}

export function vec2AddScalar(v: Vec2, s: number): Vec2 {
    return { x: v.x + s, y: v.y + s };
}

export function vec2AddScalarInto(out: Vec2, v: Vec2, s: number): Vec2 {
    out.x = v.x + s;
    out.y = v.y + s;
    return out;
}

export function vec2Sub(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x - b.x, y: a.y - b.y };
}

export function vec2SubInto(out: Vec2, a: Vec2, b: Vec2): Vec2 {
    out.x = a.x - b.x;
    out.y = a.y - b.y;
    return out;
}

export function vec2SubScalar(v: Vec2, s: number): Vec2 {
    return { x: v.x - s, y: v.y - s };
}

export function vec2SubScalarInto(out: Vec2, v: Vec2, s: number): Vec2 {
    out.x = v.x - s;
    out.y = v.y - s;
    return out;
}

/** Componentwise product */
export function vec2Mul(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x * b.x, y: a.y * b.y };
}

export function vec2MulInto(out: Vec2, a: Vec2, b: Vec2): Vec2 {
    out.x = a.x * b.x;
    out.y = a.y * b.y;
    return out;
}

export function vec2Scale(v: Vec2, s: number): Vec2 {
    return { x: v.x * s, y: v.y * s };
}

export function vec2ScaleInto(out: Vec2, v: Vec2, s: number): Vec2 {
    out.x = v.x * s;
    out.y = v.y * s;
    return out;
}

/** Componentwise quotient */
export function vec2Div(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x / b.x, y: a.y / b.y };
}

export function vec2DivInto(out: Vec2, a: Vec2, b: Vec2): Vec2 {
    out.x = a.x / b.x;
    out.y = a.y / b.y;
    return out;
}

export function vec2DivScalar(v: Vec2, s: number): Vec2 {
    return { x: v.x / s, y: v.y / s };
}

export function vec2DivScalarInto(out: Vec2, v: Vec2, s: number): Vec2 {
    out.x = v.x / s;
    out.y = v.y / s;
    return out;
}

// ============================================
// Products, length, distance
// ============================================

export function vec2Dot(a: Vec2, b: Vec2): number {
    return a.x * b.x + a.y * b.y;
}

export function vec2LengthSq(v: Vec2): number {
    return v.x * v.x + v.y * v.y;
}

export function vec2Length(v: Vec2): number {
    return Math.sqrt(vec2LengthSq(v));
}

/** Zero stays zero */
export function vec2Normalize(v: Vec2): Vec2 {
    return vec2NormalizeInto(vec2Zero(), v);
}

export function vec2NormalizeInto(out: Vec2, v: Vec2): Vec2 {
    const len = vec2Length(v);
    if (len === 0) {
        out.x = 0;
        out.y = 0;
        return out;
    }
    out.x = v.x / len;
    out.y = v.y / len;
    return out;
}

export function vec2WithLength(v: Vec2, length: number): Vec2 {
    return vec2WithLengthInto(vec2Zero(), v, length);
}

export function vec2WithLengthInto(out: Vec2, v: Vec2, length: number): Vec2 {
    vec2NormalizeInto(out, v);
    return vec2ScaleInto(out, out, length);
}

export function vec2DistanceSq(a: Vec2, b: Vec2): number {
    return vec2LengthSq(vec2Sub(b, a));
}

export function vec2Distance(a: Vec2, b: Vec2): number {
    return Math.sqrt(vec2DistanceSq(a, b));
}

// ============================================
// Angles and rotation (radians)
// ============================================

export function vec2Angle(v: Vec2): number {
    return Math.atan2(v.y, v.x);
}

/** Unsigned angle between two vectors, NaN if either is zero */
export function vec2AngleTo(a: Vec2, b: Vec2): number {
    const cos = vec2Dot(a, b) / (vec2Length(a) * vec2Length(b));
    // rounding can push cos just past ±1
    return Math.acos(Math.max(-1, Math.min(1, cos)));
}

export function vec2Rotate(v: Vec2, angle: number): Vec2 {
    return vec2RotateInto(vec2Zero(), v, angle);
}

export function vec2RotateInto(out: Vec2, v: Vec2, angle: number): Vec2 {
    const cos = Math.cos(angle);
    const sin = Math.sin(angle);
    const x = v.x * cos - v.y * sin;
    const y = v.x * sin + v.y * cos;
    out.x = x;
    out.y = y;
    return out;
}

// ============================================
// Interpolation, comparison
// ============================================

/** `amount` is capped at 1 so the result never passes `to` */
export function vec2Lerp(from: Vec2, to: Vec2, amount: number): Vec2 {
    return vec2LerpInto(vec2Zero(), from, to, amount);
}

export function vec2LerpInto(out: Vec2, from: Vec2, to: Vec2, amount: number): Vec2 {
    const t = Math.min(amount, 1);
    const x = from.x + (to.x - from.x) * t;
    const y = from.y + (to.y - from.y) * t;
    out.x = x;
    out.y = y;
    return out;
}

export function vec2Equals(a: Vec2, b: Vec2): boolean {
    return a.x === b.x && a.y === b.y;
}
