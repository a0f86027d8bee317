// Command steps - one pure cursor transition per command family

import { flattenArc, flattenCubic, flattenQuadratic } from '../geometry/curves'
import type { DegenerateArcReason } from '../geometry/curves'
import { samePoint } from '../geometry/math'
import type { Point } from '../geometry/types'
import type { CommandFamily, ControlPoint, InterpretOptions, ParseState, PathCommand } from './types'

/** Numbers consumed by one repetition of each command */
export const COMMAND_ARITY: Record<CommandFamily, number> = {
  moveto: 2,
  lineto: 2,
  horizontal: 1,
  vertical: 1,
  cubic: 6,
  smoothCubic: 4,
  quadratic: 4,
  smoothQuadratic: 2,
  arc: 7,
  closepath: 0,
}

const FAMILY_BY_COMMAND: Record<PathCommand, CommandFamily> = {
  M: 'moveto', m: 'moveto',
  L: 'lineto', l: 'lineto',
  H: 'horizontal', h: 'horizontal',
  V: 'vertical', v: 'vertical',
  C: 'cubic', c: 'cubic',
  S: 'smoothCubic', s: 'smoothCubic',
  Q: 'quadratic', q: 'quadratic',
  T: 'smoothQuadratic', t: 'smoothQuadratic',
  A: 'arc', a: 'arc',
  Z: 'closepath', z: 'closepath',
}

export function commandFamily(command: PathCommand): CommandFamily {
  return FAMILY_BY_COMMAND[command]
}

export function isRelativeCommand(command: PathCommand): boolean {
  return command === command.toLowerCase()
}

export const INITIAL_STATE: ParseState = {
  current: { x: 0, y: 0 },
  start: { x: 0, y: 0 },
  lastControl: null,
  closed: false,
}

/**
 * Result of applying one argument group
 */
export interface Step {
  state: ParseState
  /** Points appended to the current subpath */
  points: Point[]
  /** Set when the step fell back to a straight line */
  degenerate?: DegenerateArcReason
}

type StepFn = (
  state: ParseState,
  args: number[],
  relative: boolean,
  options: InterpretOptions
) => Step

function resolve(state: ParseState, x: number, y: number, relative: boolean): Point {
  return relative
    ? { x: state.current.x + x, y: state.current.y + y }
    : { x, y }
}

/**
 * Mirror the remembered control point about the current point, if it came
 * from the same curve family; otherwise the current point itself
 */
function reflectControl(state: ParseState, family: ControlPoint['family']): Point {
  const { current, lastControl } = state
  if (lastControl && lastControl.family === family) {
    return {
      x: 2 * current.x - lastControl.point.x,
      y: 2 * current.y - lastControl.point.y,
    }
  }
  return { x: current.x, y: current.y }
}

function lineStep(state: ParseState, end: Point): Step {
  return {
    state: { current: end, start: state.start, lastControl: null, closed: false },
    points: [end],
  }
}

// Shared by every curve: the first sample repeats the current point
function curveStep(
  state: ParseState,
  samples: Point[],
  end: Point,
  lastControl: ControlPoint | null
): Step {
  return {
    state: { current: end, start: state.start, lastControl, closed: false },
    points: samples.slice(1),
  }
}

const moveto: StepFn = (state, args, relative) => {
  const point = resolve(state, args[0], args[1], relative)
  return {
    state: { current: point, start: point, lastControl: null, closed: false },
    points: [point],
  }
}

const lineto: StepFn = (state, args, relative) =>
  lineStep(state, resolve(state, args[0], args[1], relative))

const horizontal: StepFn = (state, args, relative) => {
  const x = relative ? state.current.x + args[0] : args[0]
  return lineStep(state, { x, y: state.current.y })
}

const vertical: StepFn = (state, args, relative) => {
  const y = relative ? state.current.y + args[0] : args[0]
  return lineStep(state, { x: state.current.x, y })
}

const cubic: StepFn = (state, args, relative, options) => {
  const c1 = resolve(state, args[0], args[1], relative)
  const c2 = resolve(state, args[2], args[3], relative)
  const end = resolve(state, args[4], args[5], relative)
  const samples = flattenCubic(state.current, c1, c2, end, options.cubicSegments)
  return curveStep(state, samples, end, { family: 'cubic', point: c2 })
}

const smoothCubic: StepFn = (state, args, relative, options) => {
  const c1 = reflectControl(state, 'cubic')
  const c2 = resolve(state, args[0], args[1], relative)
  const end = resolve(state, args[2], args[3], relative)
  const samples = flattenCubic(state.current, c1, c2, end, options.cubicSegments)
  return curveStep(state, samples, end, { family: 'cubic', point: c2 })
}

const quadratic: StepFn = (state, args, relative, options) => {
  const control = resolve(state, args[0], args[1], relative)
  const end = resolve(state, args[2], args[3], relative)
  const samples = flattenQuadratic(state.current, control, end, options.quadraticSegments)
  return curveStep(state, samples, end, { family: 'quadratic', point: control })
}

const smoothQuadratic: StepFn = (state, args, relative, options) => {
  const control = reflectControl(state, 'quadratic')
  const end = resolve(state, args[0], args[1], relative)
  const samples = flattenQuadratic(state.current, control, end, options.quadraticSegments)
  return curveStep(state, samples, end, { family: 'quadratic', point: control })
}

const arc: StepFn = (state, args, relative, options) => {
  const end = resolve(state, args[5], args[6], relative)
  const samples = flattenArc(state.current, {
    rx: args[0],
    ry: args[1],
    xAxisRotation: args[2],
    largeArc: args[3] !== 0,
    sweep: args[4] !== 0,
    end,
  }, options.arcSegments)

  const step = curveStep(state, samples.points, end, null)
  return samples.kind === 'degenerate' ? { ...step, degenerate: samples.reason } : step
}

const closepath: StepFn = (state) => {
  const { current, start } = state
  return {
    state: { current: start, start, lastControl: null, closed: true },
    points: samePoint(current, start) ? [] : [start],
  }
}

const STEPS: Record<CommandFamily, StepFn> = {
  moveto,
  lineto,
  horizontal,
  vertical,
  cubic,
  smoothCubic,
  quadratic,
  smoothQuadratic,
  arc,
  closepath,
}

/**
 * Apply one argument group of a command to the cursor
 */
export function applyCommand(
  state: ParseState,
  family: CommandFamily,
  args: number[],
  relative: boolean,
  options: InterpretOptions
): Step {
  return STEPS[family](state, args, relative, options)
}
