// SVG import types

import type { InterpretOptions } from '../pathData/types'
import type { SourceOutline } from '../outline/types'
import type { ProfileRequest } from '../profile/types'

export interface ImportIssue {
  type: 'error' | 'warning' | 'info'
  code: string
  message: string
  details?: string
}

export interface SvgReadOptions extends Partial<InterpretOptions> {
  /** Name recorded on the outline */
  name?: string
  /** Samples around circles and ellipses */
  ellipseSamples?: number
}

export type SvgReadResult =
  | { status: 'ok'; outline: SourceOutline; issues: ImportIssue[] }
  | { status: 'empty'; issues: ImportIssue[] }

export type SvgProfileResult =
  | { status: 'ok'; outline: SourceOutline; request: ProfileRequest; issues: ImportIssue[] }
  | { status: 'empty'; issues: ImportIssue[] }
