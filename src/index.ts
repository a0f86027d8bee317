// Public entry point

export * from './utils/geometry'
export * from './utils/pathData'
export * from './utils/outline'
export * from './utils/profile'
export * from './utils/svgImport'
export { OutlineError, GrammarError, SvgReadError } from './utils/errors'
export { TESSELLATION, NORMALIZATION, DOCUMENT, EXTRUSION } from './constants'
