import { describe, expect, it } from 'vitest'
import { resolveNesting } from '../geometry/polygonAnalysis'
import type { Point } from '../geometry/types'
import { composeProfile } from './compose'
import { profileFootprint } from './footprint'
import type { ProfileExtruder, ProfileRequest } from './types'

function square(min: number, max: number): Point[] {
  return [
    { x: min, y: min },
    { x: max, y: min },
    { x: max, y: max },
    { x: min, y: max },
  ]
}

function request(subpaths: Point[][], depth = 2): ProfileRequest {
  return { polygons: resolveNesting(subpaths), depth, style: 'raised' }
}

// Records the composition as an expression, naming each solid by its first x
function expressionExtruder(depths: number[] = []): ProfileExtruder<string> {
  return {
    extrude: (polygon, depth) => {
      depths.push(depth)
      return `s${polygon[0].x}`
    },
    union: (a, b) => `(${a}+${b})`,
    subtract: (a, b) => `(${a}-${b})`,
  }
}

describe('composeProfile', () => {
  it('subtracts holes and adds islands back in nesting order', () => {
    const result = composeProfile(request([square(40, 60), square(0, 100), square(25, 75)]), expressionExtruder())
    expect(result).toBe('((s0-s25)+s40)')
  })

  it('unions separate fills', () => {
    expect(composeProfile(request([square(0, 10), square(20, 25)]), expressionExtruder())).toBe('(s0+s20)')
  })

  it('extrudes with the requested depth', () => {
    const depths: number[] = []
    composeProfile(request([square(0, 10), square(2, 8)], 3.5), expressionExtruder(depths))
    expect(depths).toEqual([3.5, 3.5])
  })

  it('skips holes that come before any fill', () => {
    const [outer, hole] = resolveNesting([square(0, 100), square(25, 75)])
    const result = composeProfile({ polygons: [hole, outer], depth: 1, style: 'cutout' }, expressionExtruder())
    expect(result).toBe('s0')
  })

  it('is null for an empty request', () => {
    expect(composeProfile(request([]), expressionExtruder())).toBeNull()
  })
})

describe('profileFootprint', () => {
  it('cuts holes out of the surrounding fill', () => {
    const { polygons, area } = profileFootprint(request([square(0, 100), square(25, 75)]))
    expect(polygons).toHaveLength(1)
    expect(polygons[0].holes).toHaveLength(1)
    expect(area).toBeCloseTo(7500)
  })

  it('keeps an island inside a hole', () => {
    const { polygons, area } = profileFootprint(request([square(0, 100), square(25, 75), square(40, 60)]))
    expect(polygons).toHaveLength(2)
    expect(area).toBeCloseTo(7900)
  })

  it('is empty when nothing fills', () => {
    expect(profileFootprint(request([]))).toEqual({ polygons: [], area: 0 })
  })
})
