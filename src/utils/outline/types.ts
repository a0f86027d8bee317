// Source outline types

import type { Point } from '../geometry/types'

export interface ViewBox {
  minX: number
  minY: number
  width: number
  height: number
}

/**
 * Raw subpaths of one imported element together with the coordinate
 * rectangle they were drawn in
 */
export interface SourceOutline {
  name?: string
  subpaths: Point[][]
  /** Declared width/height of the source, units stripped */
  width: number
  height: number
  viewBox: ViewBox
}

export interface NormalizeOptions {
  /** Length the larger viewBox side maps to */
  targetSize: number
  /** Multiplier applied on top of the fit-to-size scale */
  userScale: number
  /** Points closer than this, in target units, are merged */
  epsilon: number
  /** Douglas-Peucker tolerance in target units; 0 disables simplification */
  simplifyTolerance: number
}

export interface OutlineTransform {
  scale: number
  centerX: number
  centerY: number
}
