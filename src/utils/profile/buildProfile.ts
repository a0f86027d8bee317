// Profile pipeline - normalized outline to role-tagged polygons

import { EXTRUSION } from '../../constants'
import { resolveNesting } from '../geometry/polygonAnalysis'
import { DEFAULT_NORMALIZE_OPTIONS, normalizeOutline } from '../outline/normalization'
import type { SourceOutline } from '../outline/types'
import type { ProfileOptions, ProfileResult } from './types'

export const DEFAULT_PROFILE_OPTIONS: ProfileOptions = {
  ...DEFAULT_NORMALIZE_OPTIONS,
  depth: EXTRUSION.DEPTH,
  style: EXTRUSION.STYLE,
}

/**
 * Normalize an outline and resolve its nesting. An outline with no subpath
 * that survives cleaning is reported as empty, not as an error.
 */
export function buildProfile(outline: SourceOutline, options: Partial<ProfileOptions> = {}): ProfileResult {
  const opts: ProfileOptions = { ...DEFAULT_PROFILE_OPTIONS, ...options }

  const polygons = resolveNesting(normalizeOutline(outline, opts))
  if (polygons.length === 0) return { status: 'empty' }

  return {
    status: 'ok',
    request: { polygons, depth: opts.depth, style: opts.style },
  }
}
