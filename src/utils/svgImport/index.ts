// SVG import module exports

export type {
  ImportIssue,
  SvgReadOptions,
  SvgReadResult,
  SvgProfileResult,
} from './types'

export { readSvgOutline } from './svgReader'
export { importSvgProfile } from './importProfile'
export type { SvgProfileOptions } from './importProfile'
