// Geometry type definitions

export interface Point {
  x: number
  y: number
}

export interface PolygonWithHoles {
  outer: Point[]
  holes: Point[][]
}

/**
 * Axis-aligned bounding box, stored as min/max corners
 */
export interface Bounds {
  minX: number
  minY: number
  maxX: number
  maxY: number
}

// Role of a flattened outline when the profile is composed
// - 'fill': added to the solid (even nesting level)
// - 'hole': cut out of the solid (odd nesting level)
export type Role = 'fill' | 'hole'

/**
 * A cleaned subpath with its containment data, as handed to the extruder
 */
export interface NestedSubpath {
  points: Point[]
  bounds: Bounds
  area: number
  level: number
  role: Role
  /** Index of the subpath in the resolver's input */
  sourceIndex: number
}
