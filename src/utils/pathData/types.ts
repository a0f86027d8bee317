// Path data token and command types

import type { Point } from '../geometry/types'

export type PathCommand =
  | 'M' | 'm' | 'L' | 'l' | 'H' | 'h' | 'V' | 'v'
  | 'C' | 'c' | 'S' | 's' | 'Q' | 'q' | 'T' | 't'
  | 'A' | 'a' | 'Z' | 'z'

export type PathToken =
  | { type: 'command'; command: PathCommand; offset: number }
  | { type: 'number'; value: number; text: string; offset: number }

export type CommandFamily =
  | 'moveto'
  | 'lineto'
  | 'horizontal'
  | 'vertical'
  | 'cubic'
  | 'smoothCubic'
  | 'quadratic'
  | 'smoothQuadratic'
  | 'arc'
  | 'closepath'

/**
 * Control point remembered for S/T reflection, tagged with the curve
 * family that produced it
 */
export interface ControlPoint {
  family: 'cubic' | 'quadratic'
  point: Point
}

/**
 * Cursor state between two command groups. Each step returns a new record.
 */
export interface ParseState {
  readonly current: Point
  readonly start: Point
  readonly lastControl: ControlPoint | null
  /** True right after Z/z, until the next drawing command */
  readonly closed: boolean
}

export interface InterpretOptions {
  cubicSegments: number
  quadraticSegments: number
  arcSegments: number
}
