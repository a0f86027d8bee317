// Math utilities for geometry operations

import type { Bounds, Point } from './types'

/**
 * Calculate distance between two points
 */
export function distance(p1: Point, p2: Point): number {
  const dx = p2.x - p1.x
  const dy = p2.y - p1.y
  return Math.sqrt(dx * dx + dy * dy)
}

/**
 * Exact coordinate equality
 */
export function samePoint(p1: Point, p2: Point): boolean {
  return p1.x === p2.x && p1.y === p2.y
}

/**
 * Calculate signed area of polygon (positive = counter-clockwise in a y-up frame)
 */
export function calcPolygonArea(polygon: Point[]): number {
  if (polygon.length < 3) return 0
  let area = 0
  for (let i = 0; i < polygon.length; i++) {
    const j = (i + 1) % polygon.length
    area += polygon[i].x * polygon[j].y
    area -= polygon[j].x * polygon[i].y
  }
  return area / 2
}

/**
 * Calculate the bounding box of a set of points, or null when there are none
 */
export function getBounds(points: Point[]): Bounds | null {
  if (points.length === 0) return null

  let minX = Infinity, minY = Infinity
  let maxX = -Infinity, maxY = -Infinity

  for (const p of points) {
    minX = Math.min(minX, p.x)
    minY = Math.min(minY, p.y)
    maxX = Math.max(maxX, p.x)
    maxY = Math.max(maxY, p.y)
  }

  return { minX, minY, maxX, maxY }
}

export function boundsArea(bounds: Bounds): number {
  return (bounds.maxX - bounds.minX) * (bounds.maxY - bounds.minY)
}

/**
 * Whether `outer` fully contains `inner` (shared edges count as contained)
 */
export function boundsContain(outer: Bounds, inner: Bounds): boolean {
  return outer.minX <= inner.minX &&
    outer.minY <= inner.minY &&
    outer.maxX >= inner.maxX &&
    outer.maxY >= inner.maxY
}
