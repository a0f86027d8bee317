// SVG text straight to a profile request

import { buildProfile } from '../profile/buildProfile'
import type { ProfileOptions } from '../profile/types'
import { readSvgOutline } from './svgReader'
import type { SvgProfileResult, SvgReadOptions } from './types'

export type SvgProfileOptions = SvgReadOptions & Partial<ProfileOptions>

/**
 * Read an SVG document and build its profile in one call
 */
export function importSvgProfile(svgText: string, options: SvgProfileOptions = {}): SvgProfileResult {
  const read = readSvgOutline(svgText, options)
  if (read.status === 'empty') return read

  const profile = buildProfile(read.outline, options)
  if (profile.status === 'empty') {
    return { status: 'empty', issues: read.issues }
  }

  return { status: 'ok', outline: read.outline, request: profile.request, issues: read.issues }
}
