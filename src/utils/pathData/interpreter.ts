// Path data interpreter - folds the token stream into flattened subpaths

import { TESSELLATION } from '../../constants'
import { GrammarError } from '../errors'
import type { DegenerateArcReason } from '../geometry/curves'
import type { Point } from '../geometry/types'
import { COMMAND_ARITY, INITIAL_STATE, applyCommand, commandFamily, isRelativeCommand } from './commands'
import { tokenizePathData } from './tokenizer'
import type { InterpretOptions, ParseState, PathCommand, PathToken } from './types'

type NumberToken = Extract<PathToken, { type: 'number' }>

/**
 * Input the interpreter repaired instead of rejecting
 */
export type RecoveryNote =
  | { kind: 'argument-underflow'; command: PathCommand; dropped: number; offset: number }
  | { kind: 'degenerate-arc'; reason: DegenerateArcReason; offset: number }

export type PathParseResult =
  | { status: 'ok'; subpaths: Point[][]; notes: RecoveryNote[] }
  | { status: 'error'; error: GrammarError }

export const DEFAULT_INTERPRET_OPTIONS: InterpretOptions = {
  cubicSegments: TESSELLATION.CUBIC_SEGMENTS,
  quadraticSegments: TESSELLATION.QUADRATIC_SEGMENTS,
  arcSegments: TESSELLATION.ARC_SEGMENTS,
}

function numberRun(tokens: readonly PathToken[], from: number): NumberToken[] {
  const run: NumberToken[] = []
  for (let i = from; i < tokens.length; i++) {
    const token = tokens[i]
    if (token.type !== 'number') break
    run.push(token)
  }
  return run
}

function strayNumbers(run: NumberToken[], message: string): PathParseResult {
  const fragment = run.map(t => t.text).join(' ')
  return { status: 'error', error: new GrammarError(message, fragment, run[0].offset) }
}

/**
 * Interpret a token stream. Each command letter is followed by zero or more
 * argument groups; a trailing partial group is dropped. Never throws:
 * numbers no command can take produce an error outcome for the whole path.
 */
export function interpretPath(
  tokens: readonly PathToken[],
  options: Partial<InterpretOptions> = {}
): PathParseResult {
  const opts: InterpretOptions = { ...DEFAULT_INTERPRET_OPTIONS, ...options }
  const subpaths: Point[][] = []
  const notes: RecoveryNote[] = []
  let subpath: Point[] = []
  let state: ParseState = INITIAL_STATE

  const first = tokens[0]
  if (first && first.type === 'command' && commandFamily(first.command) !== 'moveto') {
    return {
      status: 'error',
      error: new GrammarError('Path data must begin with a moveto command', first.command, first.offset),
    }
  }

  let i = 0
  while (i < tokens.length) {
    const token = tokens[i]
    if (token.type === 'number') {
      // Only reachable before the first command
      return strayNumbers(numberRun(tokens, i), 'Path data must begin with a moveto command')
    }

    const family = commandFamily(token.command)
    const relative = isRelativeCommand(token.command)
    const run = numberRun(tokens, i + 1)
    i += 1 + run.length

    if (family === 'closepath') {
      if (run.length > 0) {
        return strayNumbers(run, `Numbers cannot follow closepath "${token.command}"`)
      }
      const step = applyCommand(state, family, [], relative, opts)
      subpath.push(...step.points)
      state = step.state
      continue
    }

    const arity = COMMAND_ARITY[family]
    const groups = Math.floor(run.length / arity)
    const dropped = run.length - groups * arity
    if (groups === 0 || dropped > 0) {
      notes.push({ kind: 'argument-underflow', command: token.command, dropped, offset: token.offset })
    }

    for (let g = 0; g < groups; g++) {
      const args = run.slice(g * arity, (g + 1) * arity).map(t => t.value)
      // Pairs after the first moveto pair are implicit linetos
      const groupFamily = family === 'moveto' && g > 0 ? 'lineto' : family

      if (groupFamily === 'moveto') {
        if (subpath.length > 0) subpaths.push(subpath)
        const step = applyCommand(state, groupFamily, args, relative, opts)
        subpath = [...step.points]
        state = step.state
        continue
      }

      // Drawing after a closepath without a moveto starts a new subpath at the old start
      if (state.closed) {
        subpaths.push(subpath)
        subpath = [{ x: state.start.x, y: state.start.y }]
      }

      const step = applyCommand(state, groupFamily, args, relative, opts)
      subpath.push(...step.points)
      state = step.state
      if (step.degenerate) {
        notes.push({ kind: 'degenerate-arc', reason: step.degenerate, offset: token.offset })
      }
    }
  }

  if (subpath.length > 0) subpaths.push(subpath)

  return { status: 'ok', subpaths, notes }
}

/**
 * Tokenize and interpret a path d attribute
 */
export function parsePathData(d: string, options: Partial<InterpretOptions> = {}): PathParseResult {
  return interpretPath(tokenizePathData(d), options)
}
