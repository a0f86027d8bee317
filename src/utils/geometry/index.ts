// Geometry module - re-exports all geometry utilities

// Types
export type {
  Point,
  PolygonWithHoles,
  Bounds,
  Role,
  NestedSubpath,
} from './types'

// Math utilities
export {
  distance,
  samePoint,
  calcPolygonArea,
  getBounds,
  boundsArea,
  boundsContain,
} from './math'

// Curve flattening
export {
  segmentCount,
  flattenCubic,
  flattenQuadratic,
  flattenArc,
  vectorAngle,
} from './curves'
export type { ArcParams, ArcSamples, DegenerateArcReason } from './curves'

// Primitive shapes
export {
  isPrimitiveShapeKind,
  readShapeElement,
  parsePointList,
  shapeToPoints,
} from './shapes'
export type { PrimitiveShape, PrimitiveShapeKind, AttributeSource } from './shapes'

// Polygon analysis
export {
  roleForLevel,
  resolveNesting,
  groupFillsWithHoles,
} from './polygonAnalysis'
