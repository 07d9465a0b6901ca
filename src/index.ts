/**
 * Grid Broadphase
 *
 * Fixed-capacity spatial hash for per-frame collision candidate queries,
 * plus the small vector toolkit that usually comes with it.
 */

// ============================================
// Spatial (Grid Hash)
// ============================================
export * from './spatial';

// ============================================
// Math
// ============================================
export * from './math';
