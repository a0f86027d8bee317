import { describe, expect, it } from 'vitest'
import { groupFillsWithHoles, resolveNesting, roleForLevel } from './polygonAnalysis'
import type { Point } from './types'

function square(min: number, max: number): Point[] {
  return [
    { x: min, y: min },
    { x: max, y: min },
    { x: max, y: max },
    { x: min, y: max },
  ]
}

function box(minX: number, minY: number, maxX: number, maxY: number): Point[] {
  return [
    { x: minX, y: minY },
    { x: maxX, y: minY },
    { x: maxX, y: maxY },
    { x: minX, y: maxY },
  ]
}

describe('roleForLevel', () => {
  it('alternates fill and hole', () => {
    expect([0, 1, 2, 3].map(roleForLevel)).toEqual(['fill', 'hole', 'fill', 'hole'])
  })
})

describe('resolveNesting', () => {
  it('makes a contained square a hole', () => {
    const nested = resolveNesting([square(0, 100), square(25, 75)])
    expect(nested.map(n => n.level)).toEqual([0, 1])
    expect(nested.map(n => n.role)).toEqual(['fill', 'hole'])
    expect(nested[0].area).toBe(10000)
    expect(nested[1].bounds).toEqual({ minX: 25, minY: 25, maxX: 75, maxY: 75 })
  })

  it('fills an island inside a hole', () => {
    const nested = resolveNesting([square(0, 100), square(25, 75), square(40, 60)])
    expect(nested.map(n => n.level)).toEqual([0, 1, 2])
    expect(nested.map(n => n.role)).toEqual(['fill', 'hole', 'fill'])
  })

  it('orders by area and remembers the input position', () => {
    const nested = resolveNesting([square(25, 75), square(0, 100)])
    expect(nested.map(n => n.sourceIndex)).toEqual([1, 0])
    expect(nested.map(n => n.level)).toEqual([0, 1])
  })

  it('keeps side-by-side outlines at level zero', () => {
    const nested = resolveNesting([square(0, 10), square(20, 30)])
    expect(nested.map(n => n.level)).toEqual([0, 0])
    expect(nested.map(n => n.sourceIndex)).toEqual([0, 1])
  })

  it('nests under the smallest container', () => {
    const nested = resolveNesting([
      box(0, 0, 100, 100),
      box(10, 10, 50, 50),
      box(60, 60, 90, 90),
      box(20, 20, 30, 30),
    ])
    expect(nested.map(n => n.sourceIndex)).toEqual([0, 1, 2, 3])
    expect(nested.map(n => n.level)).toEqual([0, 1, 1, 2])
  })

  it('treats an identical box as contained', () => {
    const nested = resolveNesting([square(0, 10), square(0, 10)])
    expect(nested.map(n => n.level)).toEqual([0, 1])
  })

  it('skips empty subpaths', () => {
    const nested = resolveNesting([[], square(0, 10)])
    expect(nested).toHaveLength(1)
    expect(nested[0].sourceIndex).toBe(1)
  })

  it('returns nothing for no input', () => {
    expect(resolveNesting([])).toEqual([])
  })
})

describe('groupFillsWithHoles', () => {
  it('attaches each hole to the fill around it', () => {
    const outer = square(0, 100)
    const hole = square(25, 75)
    const island = square(40, 60)
    const other = box(200, 0, 210, 10)

    const regions = groupFillsWithHoles(resolveNesting([island, outer, other, hole]))
    expect(regions).toEqual([
      { outer, holes: [hole] },
      { outer: island, holes: [] },
      { outer: other, holes: [] },
    ])
  })
})
