// Profile module exports

export type {
  ExtrusionStyle,
  ProfileRequest,
  ProfileOptions,
  ProfileResult,
  ProfileExtruder,
} from './types'

export { composeProfile } from './compose'
export { DEFAULT_PROFILE_OPTIONS, buildProfile } from './buildProfile'

export {
  pointsToFootprint,
  footprintToPolygons,
  footprintExtruder,
  regionArea,
  profileFootprint,
} from './footprint'
export type { Footprint, FootprintResult } from './footprint'
