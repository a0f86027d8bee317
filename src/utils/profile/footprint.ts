// 2D footprint of a profile using the polygon-clipping library

import polygonClipping, { Polygon as ClipPolygon } from 'polygon-clipping'
import { calcPolygonArea } from '../geometry/math'
import type { Point, PolygonWithHoles } from '../geometry/types'
import { composeProfile } from './compose'
import type { ProfileExtruder, ProfileRequest } from './types'

// A footprint is a polygon-clipping MultiPolygon (Polygon[] = Ring[][])
export type Footprint = ClipPolygon[]

export interface FootprintResult {
  polygons: PolygonWithHoles[]
  area: number
}

/**
 * Convert an outline ring to a polygon-clipping MultiPolygon
 */
export function pointsToFootprint(points: Point[]): Footprint {
  return [[points.map((p): [number, number] => [p.x, p.y])]]
}

/**
 * Convert polygon-clipping MultiPolygon result back to our format
 */
export function footprintToPolygons(footprint: Footprint): PolygonWithHoles[] {
  return footprint.map(poly => {
    const outer: Point[] = poly[0].map(([x, y]) => ({ x, y }))
    const holes: Point[][] = poly.slice(1).map(ring => ring.map(([x, y]) => ({ x, y })))
    return { outer, holes }
  })
}

/**
 * Extruder that stays in the plane: each polygon becomes its own region and
 * union/subtract are polygon-clipping boolean operations. Depth is ignored.
 */
export const footprintExtruder: ProfileExtruder<Footprint> = {
  extrude: polygon => pointsToFootprint(polygon),
  union: (a, b) => polygonClipping.union(a, b),
  subtract: (a, b) => polygonClipping.difference(a, b),
}

/**
 * Area covered by a set of regions (outer rings minus their holes)
 */
export function regionArea(polygons: PolygonWithHoles[]): number {
  let area = 0
  for (const polygon of polygons) {
    area += Math.abs(calcPolygonArea(polygon.outer))
    for (const hole of polygon.holes) {
      area -= Math.abs(calcPolygonArea(hole))
    }
  }
  return area
}

/**
 * Compose a profile in 2D and report the resulting regions and their area
 */
export function profileFootprint(request: ProfileRequest): FootprintResult {
  const footprint = composeProfile(request, footprintExtruder)
  const polygons = footprint ? footprintToPolygons(footprint) : []
  return { polygons, area: regionArea(polygons) }
}
