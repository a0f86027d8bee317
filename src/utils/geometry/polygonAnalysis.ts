// Polygon analysis utilities - containment nesting and fill/hole roles

import { boundsArea, boundsContain, getBounds } from './math'
import type { Bounds, NestedSubpath, Point, PolygonWithHoles, Role } from './types'

export function roleForLevel(level: number): Role {
  return level % 2 === 0 ? 'fill' : 'hole'
}

/**
 * Assign every subpath a nesting level and a fill/hole role.
 *
 * Subpaths are ordered by bounding-box area, largest first (stable for ties).
 * A subpath's parent is the smallest already-placed subpath whose bounding
 * box contains its own; its level is the parent's plus one. Even levels fill,
 * odd levels are holes.
 *
 * Containment is judged on bounding boxes only. That matches even-odd filling
 * for nested outlines but not for overlapping or self-intersecting ones.
 *
 * @returns subpaths in area order, not input order
 */
export function resolveNesting(subpaths: Point[][]): NestedSubpath[] {
  interface Candidate {
    points: Point[]
    sourceIndex: number
    bounds: Bounds
    area: number
  }

  const candidates: Candidate[] = []
  subpaths.forEach((points, sourceIndex) => {
    const bounds = getBounds(points)
    if (bounds) candidates.push({ points, sourceIndex, bounds, area: boundsArea(bounds) })
  })

  // Array.prototype.sort is stable, so equal areas keep input order
  candidates.sort((a, b) => b.area - a.area)

  const placed: NestedSubpath[] = []
  for (const current of candidates) {
    let level = 0
    // Walk back from the most recently placed: the first container found is the smallest
    for (let j = placed.length - 1; j >= 0; j--) {
      if (boundsContain(placed[j].bounds, current.bounds)) {
        level = placed[j].level + 1
        break
      }
    }

    placed.push({
      points: current.points,
      bounds: current.bounds,
      area: current.area,
      level,
      role: roleForLevel(level),
      sourceIndex: current.sourceIndex,
    })
  }

  return placed
}

/**
 * Group resolved subpaths into fillable regions: every fill with the holes
 * directly beneath it
 */
export function groupFillsWithHoles(nested: NestedSubpath[]): PolygonWithHoles[] {
  const regions: PolygonWithHoles[] = []
  const regionByIndex = new Map<number, PolygonWithHoles>()

  nested.forEach((entry, index) => {
    if (entry.role === 'fill') {
      const region: PolygonWithHoles = { outer: entry.points, holes: [] }
      regions.push(region)
      regionByIndex.set(index, region)
      return
    }

    for (let j = index - 1; j >= 0; j--) {
      if (boundsContain(nested[j].bounds, entry.bounds)) {
        regionByIndex.get(j)?.holes.push(entry.points)
        break
      }
    }
  })

  return regions
}
