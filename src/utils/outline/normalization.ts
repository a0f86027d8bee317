// Outline normalization - fit to target size, flip Y, drop duplicate points

import simplify from 'simplify-js'
import { NORMALIZATION } from '../../constants'
import { distance, getBounds } from '../geometry/math'
import type { Point } from '../geometry/types'
import type { NormalizeOptions, OutlineTransform, SourceOutline, ViewBox } from './types'

export const DEFAULT_NORMALIZE_OPTIONS: NormalizeOptions = {
  targetSize: NORMALIZATION.TARGET_SIZE,
  userScale: NORMALIZATION.USER_SCALE,
  epsilon: NORMALIZATION.EPSILON,
  simplifyTolerance: NORMALIZATION.SIMPLIFY_TOLERANCE,
}

// A viewBox with no positive extent is replaced by the extent of the points
function effectiveViewBox(outline: SourceOutline): ViewBox | null {
  const { viewBox } = outline
  if (Math.max(viewBox.width, viewBox.height) > 0) return viewBox

  const bounds = getBounds(outline.subpaths.flat())
  if (!bounds) return null

  const width = bounds.maxX - bounds.minX
  const height = bounds.maxY - bounds.minY
  if (Math.max(width, height) <= 0) return null

  return { minX: bounds.minX, minY: bounds.minY, width, height }
}

/**
 * Uniform scale and center mapping the outline's viewBox onto the target size.
 * Aspect ratio is preserved: one scale for both axes.
 */
export function fitTransform(
  outline: SourceOutline,
  options: Pick<NormalizeOptions, 'targetSize' | 'userScale'>
): OutlineTransform | null {
  const viewBox = effectiveViewBox(outline)
  if (!viewBox) return null

  return {
    scale: (options.targetSize / Math.max(viewBox.width, viewBox.height)) * options.userScale,
    centerX: viewBox.minX + viewBox.width / 2,
    centerY: viewBox.minY + viewBox.height / 2,
  }
}

/**
 * Center, scale and flip Y (source grows downward, target grows upward)
 */
export function applyTransform(points: Point[], transform: OutlineTransform): Point[] {
  const { scale, centerX, centerY } = transform
  return points.map(p => ({
    x: (p.x - centerX) * scale,
    y: -(p.y - centerY) * scale,
  }))
}

/**
 * Drop points closer than epsilon to the previously kept point
 */
export function removeNearDuplicates(points: Point[], epsilon: number): Point[] {
  const result: Point[] = []
  for (const p of points) {
    const last = result[result.length - 1]
    if (last && distance(last, p) < epsilon) continue
    result.push(p)
  }
  return result
}

/**
 * Dedupe consecutive points and drop a closing point that repeats the first.
 * Returns null when fewer than three points remain.
 */
export function cleanSubpath(points: Point[], epsilon: number = NORMALIZATION.EPSILON): Point[] | null {
  const cleaned = removeNearDuplicates(points, epsilon)

  if (cleaned.length > 1 && distance(cleaned[0], cleaned[cleaned.length - 1]) < epsilon) {
    cleaned.pop()
  }

  return cleaned.length >= NORMALIZATION.MIN_POLYGON_POINTS ? cleaned : null
}

/**
 * Douglas-Peucker simplification via simplify-js
 */
export function simplifySubpath(points: Point[], tolerance: number): Point[] {
  if (tolerance <= 0 || points.length <= NORMALIZATION.MIN_POLYGON_POINTS) return points

  const simplified = simplify(
    points.map(p => ({ x: p.x, y: p.y })),
    tolerance,
    true
  )

  return simplified.map(p => ({ x: p.x, y: p.y }))
}

/**
 * Map an outline into target coordinates and keep only the subpaths that
 * still form a polygon. Input order is preserved.
 */
export function normalizeOutline(
  outline: SourceOutline,
  options: Partial<NormalizeOptions> = {}
): Point[][] {
  const opts: NormalizeOptions = { ...DEFAULT_NORMALIZE_OPTIONS, ...options }
  const transform = fitTransform(outline, opts)
  if (!transform) return []

  const result: Point[][] = []
  for (const subpath of outline.subpaths) {
    const cleaned = cleanSubpath(applyTransform(subpath, transform), opts.epsilon)
    if (!cleaned) continue

    const simplified = simplifySubpath(cleaned, opts.simplifyTolerance)
    if (simplified.length >= NORMALIZATION.MIN_POLYGON_POINTS) {
      result.push(simplified)
    }
  }

  return result
}
