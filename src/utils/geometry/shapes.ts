// Primitive shape conversion - rect, circle, ellipse, polygon, polyline to points

import { TESSELLATION } from '../../constants'
import { scanNumbers } from '../pathData/tokenizer'
import type { Point } from './types'

export type PrimitiveShape =
  | { kind: 'rect'; x: number; y: number; width: number; height: number }
  | { kind: 'circle'; cx: number; cy: number; r: number }
  | { kind: 'ellipse'; cx: number; cy: number; rx: number; ry: number }
  | { kind: 'polygon'; points: string }
  | { kind: 'polyline'; points: string }

export type PrimitiveShapeKind = PrimitiveShape['kind']

/**
 * Anything that answers attribute lookups by name, such as a parsed SVG element
 */
export interface AttributeSource {
  readonly localName: string
  getAttribute(name: string): string | null
}

const SHAPE_KINDS: readonly PrimitiveShapeKind[] = ['rect', 'circle', 'ellipse', 'polygon', 'polyline']

export function isPrimitiveShapeKind(name: string): name is PrimitiveShapeKind {
  return (SHAPE_KINDS as readonly string[]).includes(name)
}

function numberAttribute(element: AttributeSource, name: string): number {
  const value = parseFloat(element.getAttribute(name) || '0')
  return isNaN(value) ? 0 : value
}

/**
 * Read a primitive shape record from an element, or null for any other tag
 */
export function readShapeElement(element: AttributeSource): PrimitiveShape | null {
  const tagName = element.localName.toLowerCase()
  if (!isPrimitiveShapeKind(tagName)) return null

  switch (tagName) {
    case 'rect':
      return {
        kind: 'rect',
        x: numberAttribute(element, 'x'),
        y: numberAttribute(element, 'y'),
        width: numberAttribute(element, 'width'),
        height: numberAttribute(element, 'height'),
      }
    case 'circle':
      return {
        kind: 'circle',
        cx: numberAttribute(element, 'cx'),
        cy: numberAttribute(element, 'cy'),
        r: numberAttribute(element, 'r'),
      }
    case 'ellipse':
      return {
        kind: 'ellipse',
        cx: numberAttribute(element, 'cx'),
        cy: numberAttribute(element, 'cy'),
        rx: numberAttribute(element, 'rx'),
        ry: numberAttribute(element, 'ry'),
      }
    case 'polygon':
    case 'polyline':
      return { kind: tagName, points: element.getAttribute('points') || '' }
  }
}

/**
 * Parse a points attribute into coordinate pairs; an odd trailing number is ignored
 */
export function parsePointList(points: string): Point[] {
  const coords = scanNumbers(points)
  const result: Point[] = []
  for (let i = 0; i < coords.length - 1; i += 2) {
    result.push({ x: coords[i], y: coords[i + 1] })
  }
  return result
}

function sampleEllipse(cx: number, cy: number, rx: number, ry: number, samples: number): Point[] {
  const points: Point[] = []
  for (let i = 0; i < samples; i++) {
    const angle = (2 * Math.PI * i) / samples
    points.push({ x: cx + rx * Math.cos(angle), y: cy + ry * Math.sin(angle) })
  }
  points.push({ ...points[0] })
  return points
}

/**
 * Convert a primitive shape to its outline. Closed shapes repeat their first
 * point at the end; polylines stay open. Shapes with no area, or with no
 * coordinate pair, yield an empty list.
 */
export function shapeToPoints(
  shape: PrimitiveShape,
  ellipseSamples: number = TESSELLATION.ELLIPSE_SAMPLES
): Point[] {
  switch (shape.kind) {
    case 'rect': {
      const { x, y, width: w, height: h } = shape
      if (w <= 0 || h <= 0) return []
      return [{ x, y }, { x: x + w, y }, { x: x + w, y: y + h }, { x, y: y + h }, { x, y }]
    }
    case 'circle':
      if (shape.r <= 0) return []
      return sampleEllipse(shape.cx, shape.cy, shape.r, shape.r, Math.max(3, Math.floor(ellipseSamples)))
    case 'ellipse':
      if (shape.rx <= 0 || shape.ry <= 0) return []
      return sampleEllipse(shape.cx, shape.cy, shape.rx, shape.ry, Math.max(3, Math.floor(ellipseSamples)))
    case 'polygon': {
      const points = parsePointList(shape.points)
      if (points.length === 0) return []
      return [...points, { ...points[0] }]
    }
    case 'polyline':
      return parsePointList(shape.points)
  }
}
