// Path data tokenizer - splits a d attribute into command letters and numbers

import type { PathCommand, PathToken } from './types'

const COMMAND_LETTERS = 'MmLlHhVvCcSsQqTtAaZz'

// Sign, digits with at most one decimal point, optional exponent.
// A second '.' or a sign always starts the next literal.
const NUMBER_SOURCE = '[+-]?(?:\\d+\\.?\\d*|\\.\\d+)(?:[eE][+-]?\\d+)?'

export function isPathCommand(ch: string): ch is PathCommand {
  return ch.length === 1 && COMMAND_LETTERS.includes(ch)
}

/**
 * Tokenize path data. Characters that are neither a command letter nor part
 * of a number are skipped.
 */
export function tokenizePathData(d: string): PathToken[] {
  const numberPattern = new RegExp(NUMBER_SOURCE, 'y')
  const tokens: PathToken[] = []
  let i = 0

  while (i < d.length) {
    const ch = d[i]

    if (isPathCommand(ch)) {
      tokens.push({ type: 'command', command: ch, offset: i })
      i++
      continue
    }

    numberPattern.lastIndex = i
    const match = numberPattern.exec(d)
    if (match) {
      tokens.push({ type: 'number', value: parseFloat(match[0]), text: match[0], offset: i })
      i = numberPattern.lastIndex
      continue
    }

    i++
  }

  return tokens
}

/**
 * Extract every number from free-form text such as a points attribute
 */
export function scanNumbers(text: string): number[] {
  const numbers: number[] = []
  for (const match of text.matchAll(new RegExp(NUMBER_SOURCE, 'g'))) {
    numbers.push(parseFloat(match[0]))
  }
  return numbers
}
