/**
 * Math Module
 *
 * Float 2D vector helpers.
 */

export type { Vec2 } from './vec2';
export {
    vec2,
    vec2Zero,
    vec2Clone,
    vec2FromPolar,
    vec2ToPolar,
    // Arithmetic
    vec2Add,
    vec2AddInto,
    vec2AddScalar,
    vec2AddScalarInto,
    vec2Sub,
    vec2SubInto,
    vec2SubScalar,
    vec2SubScalarInto,
    vec2Mul,
    vec2MulInto,
    vec2Scale,
    vec2ScaleInto,
    vec2Div,
    vec2DivInto,
    vec2DivScalar,
    vec2DivScalarInto,
    // Length and distance
    vec2Dot,
    vec2LengthSq,
    vec2Length,
    vec2Normalize,
    vec2NormalizeInto,
    vec2WithLength,
    vec2WithLengthInto,
    vec2DistanceSq,
    vec2Distance,
    // Angles
    vec2Angle,
    vec2AngleTo,
    vec2Rotate,
    vec2RotateInto,
    // Interpolation
    vec2Lerp,
    vec2LerpInto,
    vec2Equals
} from './vec2';
