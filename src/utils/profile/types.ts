// Profile types - the hand-off to the solid modeling collaborator

import type { NestedSubpath, Point } from '../geometry/types'
import type { NormalizeOptions } from '../outline/types'

// Placement hint passed through to the extruder, never interpreted here
// - 'raised': stands proud of the base surface
// - 'engraved': sunk into the base surface
// - 'cutout': cut through the base
export type ExtrusionStyle = 'raised' | 'engraved' | 'cutout'

/**
 * Role-tagged polygons in composition order, plus extrusion parameters
 */
export interface ProfileRequest {
  polygons: NestedSubpath[]
  depth: number
  style: ExtrusionStyle
}

export interface ProfileOptions extends NormalizeOptions {
  depth: number
  style: ExtrusionStyle
}

export type ProfileResult =
  | { status: 'ok'; request: ProfileRequest }
  | { status: 'empty' }

/**
 * Solid modeling collaborator. Implementations own every numerical
 * robustness concern of their boolean operations.
 */
export interface ProfileExtruder<TSolid> {
  extrude(polygon: Point[], depth: number): TSolid
  union(a: TSolid, b: TSolid): TSolid
  subtract(a: TSolid, b: TSolid): TSolid
}
