// Path data module - tokenizer and interpreter

export type {
  PathCommand,
  PathToken,
  CommandFamily,
  ControlPoint,
  ParseState,
  InterpretOptions,
} from './types'

export {
  isPathCommand,
  tokenizePathData,
  scanNumbers,
} from './tokenizer'

export {
  COMMAND_ARITY,
  INITIAL_STATE,
  applyCommand,
  commandFamily,
  isRelativeCommand,
} from './commands'
export type { Step } from './commands'

export {
  DEFAULT_INTERPRET_OPTIONS,
  interpretPath,
  parsePathData,
} from './interpreter'
export type { PathParseResult, RecoveryNote } from './interpreter'
