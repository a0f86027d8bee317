// Curve flattening - samples Bézier and arc segments into polyline points

import { TESSELLATION } from '../../constants'
import type { Point } from './types'

const TAU = Math.PI * 2

export interface ArcParams {
  rx: number
  ry: number
  /** Rotation of the ellipse's x axis, in degrees */
  xAxisRotation: number
  largeArc: boolean
  sweep: boolean
  end: Point
}

export type DegenerateArcReason = 'zero-radius' | 'coincident-endpoints'

/**
 * Arc sampling outcome. A degenerate arc still yields usable points: the
 * straight chord from start to end.
 */
export type ArcSamples =
  | { kind: 'ok'; points: Point[] }
  | { kind: 'degenerate'; reason: DegenerateArcReason; points: Point[] }

/**
 * Clamp a requested segment count to a whole number >= 1
 */
export function segmentCount(requested: number): number {
  if (!Number.isFinite(requested)) return 1
  return Math.max(1, Math.floor(requested))
}

/**
 * Sample a cubic Bézier at `segments + 1` evenly spaced t values.
 * The first and last points are exactly p0 and p3.
 */
export function flattenCubic(
  p0: Point,
  p1: Point,
  p2: Point,
  p3: Point,
  segments: number = TESSELLATION.CUBIC_SEGMENTS
): Point[] {
  const n = segmentCount(segments)
  const points: Point[] = [{ x: p0.x, y: p0.y }]

  for (let i = 1; i < n; i++) {
    const t = i / n
    const mt = 1 - t
    const a = mt * mt * mt
    const b = 3 * mt * mt * t
    const c = 3 * mt * t * t
    const d = t * t * t
    points.push({
      x: a * p0.x + b * p1.x + c * p2.x + d * p3.x,
      y: a * p0.y + b * p1.y + c * p2.y + d * p3.y,
    })
  }

  points.push({ x: p3.x, y: p3.y })
  return points
}

/**
 * Sample a quadratic Bézier at `segments + 1` evenly spaced t values
 */
export function flattenQuadratic(
  p0: Point,
  p1: Point,
  p2: Point,
  segments: number = TESSELLATION.QUADRATIC_SEGMENTS
): Point[] {
  const n = segmentCount(segments)
  const points: Point[] = [{ x: p0.x, y: p0.y }]

  for (let i = 1; i < n; i++) {
    const t = i / n
    const mt = 1 - t
    const a = mt * mt
    const b = 2 * mt * t
    const c = t * t
    points.push({
      x: a * p0.x + b * p1.x + c * p2.x,
      y: a * p0.y + b * p1.y + c * p2.y,
    })
  }

  points.push({ x: p2.x, y: p2.y })
  return points
}

/**
 * Signed angle from vector u to vector v, in radians (-π, π]
 */
export function vectorAngle(ux: number, uy: number, vx: number, vy: number): number {
  const length = Math.sqrt((ux * ux + uy * uy) * (vx * vx + vy * vy))
  if (length === 0) return 0

  const cos = Math.min(1, Math.max(-1, (ux * vx + uy * vy) / length))
  const sign = ux * vy - uy * vx < 0 ? -1 : 1
  return sign * Math.acos(cos)
}

/**
 * Sample an SVG elliptical arc from `start` to `arc.end`.
 *
 * Converts the endpoint form to a center form (rotated frame, radius
 * correction, center selection from the two flags), then samples the angle
 * range linearly. Zero radii or identical endpoints degrade to the chord.
 */
export function flattenArc(
  start: Point,
  arc: ArcParams,
  segments: number = TESSELLATION.ARC_SEGMENTS
): ArcSamples {
  const end = arc.end
  const chord = [{ x: start.x, y: start.y }, { x: end.x, y: end.y }]

  let rx = Math.abs(arc.rx)
  let ry = Math.abs(arc.ry)
  if (rx === 0 || ry === 0) {
    return { kind: 'degenerate', reason: 'zero-radius', points: chord }
  }
  if (start.x === end.x && start.y === end.y) {
    return { kind: 'degenerate', reason: 'coincident-endpoints', points: chord }
  }

  const phi = (arc.xAxisRotation % 360) * Math.PI / 180
  const cosPhi = Math.cos(phi)
  const sinPhi = Math.sin(phi)

  // Midpoint of the chord in the ellipse's local frame
  const halfDx = (start.x - end.x) / 2
  const halfDy = (start.y - end.y) / 2
  const x1p = cosPhi * halfDx + sinPhi * halfDy
  const y1p = -sinPhi * halfDx + cosPhi * halfDy

  // Radii too small to span the chord are scaled up uniformly
  const lambda = (x1p * x1p) / (rx * rx) + (y1p * y1p) / (ry * ry)
  if (lambda > 1) {
    const s = Math.sqrt(lambda)
    rx *= s
    ry *= s
  }

  const rxSq = rx * rx
  const rySq = ry * ry
  const x1pSq = x1p * x1p
  const y1pSq = y1p * y1p
  const numerator = rxSq * rySq - rxSq * y1pSq - rySq * x1pSq
  const denominator = rxSq * y1pSq + rySq * x1pSq

  let coef = numerator <= 0 || denominator === 0 ? 0 : Math.sqrt(numerator / denominator)
  if (arc.largeArc === arc.sweep) coef = -coef

  const cxp = coef * (rx * y1p) / ry
  const cyp = coef * -(ry * x1p) / rx
  const cx = cosPhi * cxp - sinPhi * cyp + (start.x + end.x) / 2
  const cy = sinPhi * cxp + cosPhi * cyp + (start.y + end.y) / 2

  const ux = (x1p - cxp) / rx
  const uy = (y1p - cyp) / ry
  const vx = (-x1p - cxp) / rx
  const vy = (-y1p - cyp) / ry

  const theta = vectorAngle(1, 0, ux, uy)
  let delta = vectorAngle(ux, uy, vx, vy)
  if (!arc.sweep && delta > 0) {
    delta -= TAU
  } else if (arc.sweep && delta < 0) {
    delta += TAU
  }

  const n = segmentCount(segments)
  const points: Point[] = [{ x: start.x, y: start.y }]
  for (let i = 1; i < n; i++) {
    const angle = theta + (delta * i) / n
    const ex = rx * Math.cos(angle)
    const ey = ry * Math.sin(angle)
    points.push({
      x: cosPhi * ex - sinPhi * ey + cx,
      y: sinPhi * ex + cosPhi * ey + cy,
    })
  }
  points.push({ x: end.x, y: end.y })

  return { kind: 'ok', points }
}
