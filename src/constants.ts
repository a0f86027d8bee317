/**
 * Import pipeline constants
 * Centralizes tessellation budgets, tolerances and profile defaults
 */

// ============================================================================
// Tessellation
// ============================================================================

export const TESSELLATION = {
  /** Line segments per cubic Bézier (C/S) */
  CUBIC_SEGMENTS: 10,
  /** Line segments per quadratic Bézier (Q/T) */
  QUADRATIC_SEGMENTS: 10,
  /** Line segments per elliptical arc (A) */
  ARC_SEGMENTS: 20,
  /** Samples around a circle or ellipse, before the closing point */
  ELLIPSE_SAMPLES: 36,
} as const

// ============================================================================
// Normalization
// ============================================================================

export const NORMALIZATION = {
  /** Length the larger viewBox side maps to, in target units (mm) */
  TARGET_SIZE: 20,
  /** Extra user scale applied on top of the fit-to-size scale */
  USER_SCALE: 1,
  /** Points closer than this (target units) are merged */
  EPSILON: 0.001,
  /** Simplification tolerance; 0 leaves the outline as sampled */
  SIMPLIFY_TOLERANCE: 0,
  /** Fewest distinct points that still form a polygon */
  MIN_POLYGON_POINTS: 3,
} as const

// ============================================================================
// Source documents
// ============================================================================

export const DOCUMENT = {
  /** Width/height used when the root element declares none */
  DEFAULT_DIMENSION: 100,
} as const

// ============================================================================
// Extrusion
// ============================================================================

export const EXTRUSION = {
  /** Default extrusion depth in mm */
  DEPTH: 2,
  STYLE: 'raised',
} as const
