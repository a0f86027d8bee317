// Profile composition - drives a ProfileExtruder over a resolved profile

import type { ProfileExtruder, ProfileRequest } from './types'

/**
 * Extrude every polygon and fold the solids together in request order:
 * fills are unioned in, holes subtracted. Request order is largest first, so
 * an island inside a hole is added back after the hole is cut.
 *
 * @returns the composed solid, or null when the request has no fill
 */
export function composeProfile<TSolid>(
  request: ProfileRequest,
  extruder: ProfileExtruder<TSolid>
): TSolid | null {
  let result: TSolid | null = null

  for (const polygon of request.polygons) {
    if (polygon.role === 'hole' && result === null) continue

    const solid = extruder.extrude(polygon.points, request.depth)
    if (result === null) {
      result = solid
    } else if (polygon.role === 'fill') {
      result = extruder.union(result, solid)
    } else {
      result = extruder.subtract(result, solid)
    }
  }

  return result
}
