// Outline module exports

export type {
  ViewBox,
  SourceOutline,
  NormalizeOptions,
  OutlineTransform,
} from './types'

export {
  parseViewBox,
  parseLengthWithUnit,
  parseDimension,
  resolveViewBox,
} from './viewBoxUtils'

export {
  DEFAULT_NORMALIZE_OPTIONS,
  fitTransform,
  applyTransform,
  removeNearDuplicates,
  cleanSubpath,
  simplifySubpath,
  normalizeOutline,
} from './normalization'
