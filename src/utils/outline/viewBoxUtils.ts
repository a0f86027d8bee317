// ViewBox and dimension parsing utilities

import { DOCUMENT } from '../../constants'
import type { ViewBox } from './types'

/**
 * Parse viewBox attribute
 */
export function parseViewBox(viewBoxAttr: string | null): ViewBox | null {
  if (!viewBoxAttr) return null

  // ViewBox can be comma or space separated
  const parts = viewBoxAttr.trim().split(/[\s,]+/).map(parseFloat)

  if (parts.length !== 4 || parts.some(isNaN)) {
    return null
  }

  return {
    minX: parts[0],
    minY: parts[1],
    width: parts[2],
    height: parts[3]
  }
}

/**
 * Parse a CSS length value with unit
 * Returns { value, unit } or null if invalid
 */
export function parseLengthWithUnit(str: string | null): { value: number; unit: string } | null {
  if (!str) return null

  const trimmed = str.trim()
  if (!trimmed) return null

  // Match number (including scientific notation) followed by optional unit
  const match = trimmed.match(/^([+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?)\s*([a-z%]*)$/i)
  if (!match) return null

  const value = parseFloat(match[1])
  if (isNaN(value)) return null

  return { value, unit: match[2].toLowerCase() }
}

/**
 * Declared width or height with its unit stripped. Only ratios matter
 * downstream, so no unit conversion happens here.
 */
export function parseDimension(attr: string | null, fallback: number = DOCUMENT.DEFAULT_DIMENSION): number {
  const length = parseLengthWithUnit(attr)
  return length ? length.value : fallback
}

/**
 * The declared viewBox, or one spanning (0, 0) to the declared width/height
 */
export function resolveViewBox(attrs: {
  viewBox: string | null
  width: string | null
  height: string | null
}): ViewBox {
  const declared = parseViewBox(attrs.viewBox)
  if (declared) return declared

  return {
    minX: 0,
    minY: 0,
    width: parseDimension(attrs.width),
    height: parseDimension(attrs.height)
  }
}
