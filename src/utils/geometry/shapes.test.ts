import { describe, expect, it } from 'vitest'
import { isPrimitiveShapeKind, parsePointList, readShapeElement, shapeToPoints } from './shapes'
import type { AttributeSource } from './shapes'

function element(localName: string, attributes: Record<string, string>): AttributeSource {
  return {
    localName,
    getAttribute: name => (name in attributes ? attributes[name] : null),
  }
}

describe('shapeToPoints', () => {
  it('traces a rect clockwise from its corner and closes it', () => {
    expect(shapeToPoints({ kind: 'rect', x: 10, y: 20, width: 30, height: 40 })).toEqual([
      { x: 10, y: 20 },
      { x: 40, y: 20 },
      { x: 40, y: 60 },
      { x: 10, y: 60 },
      { x: 10, y: 20 },
    ])
  })

  it('samples a circle and repeats the first sample', () => {
    const points = shapeToPoints({ kind: 'circle', cx: 50, cy: 50, r: 10 })
    expect(points).toHaveLength(37)
    expect(points[0]).toEqual({ x: 60, y: 50 })
    expect(points[36]).toEqual(points[0])
    expect(points[9].x).toBeCloseTo(50)
    expect(points[9].y).toBeCloseTo(60)
  })

  it('samples an ellipse with its own radii', () => {
    const points = shapeToPoints({ kind: 'ellipse', cx: 0, cy: 0, rx: 20, ry: 5 }, 4)
    expect(points).toHaveLength(5)
    expect(points[0]).toEqual({ x: 20, y: 0 })
    expect(points[1].x).toBeCloseTo(0)
    expect(points[1].y).toBeCloseTo(5)
    expect(points[2].x).toBeCloseTo(-20)
  })

  it('closes polygons and leaves polylines open', () => {
    expect(shapeToPoints({ kind: 'polygon', points: '0,0 10,0 10,10' })).toEqual([
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 },
      { x: 0, y: 0 },
    ])
    expect(shapeToPoints({ kind: 'polyline', points: '0,0 10,0 10,10' })).toHaveLength(3)
  })

  it('yields nothing for shapes without area or coordinates', () => {
    expect(shapeToPoints({ kind: 'rect', x: 0, y: 0, width: 0, height: 10 })).toEqual([])
    expect(shapeToPoints({ kind: 'rect', x: 0, y: 0, width: 10, height: -1 })).toEqual([])
    expect(shapeToPoints({ kind: 'circle', cx: 5, cy: 5, r: 0 })).toEqual([])
    expect(shapeToPoints({ kind: 'ellipse', cx: 5, cy: 5, rx: 3, ry: 0 })).toEqual([])
    expect(shapeToPoints({ kind: 'polygon', points: '' })).toEqual([])
    expect(shapeToPoints({ kind: 'polyline', points: '7' })).toEqual([])
  })
})

describe('parsePointList', () => {
  it('pairs numbers with any separator and ignores an odd trailing value', () => {
    expect(parsePointList('0,0 5-5 7')).toEqual([
      { x: 0, y: 0 },
      { x: 5, y: -5 },
    ])
  })
})

describe('readShapeElement', () => {
  it('reads numeric attributes, treating missing or invalid ones as zero', () => {
    expect(readShapeElement(element('rect', { x: '5', width: '10', height: 'abc' }))).toEqual({
      kind: 'rect',
      x: 5,
      y: 0,
      width: 10,
      height: 0,
    })
    expect(readShapeElement(element('circle', { cx: '1', cy: '2', r: '3px' }))).toEqual({
      kind: 'circle',
      cx: 1,
      cy: 2,
      r: 3,
    })
  })

  it('keeps the raw points attribute', () => {
    expect(readShapeElement(element('polyline', { points: '1 2 3 4' }))).toEqual({
      kind: 'polyline',
      points: '1 2 3 4',
    })
  })

  it('matches tag names case-insensitively and skips other elements', () => {
    expect(readShapeElement(element('ELLIPSE', { rx: '4', ry: '2' }))).toEqual({
      kind: 'ellipse',
      cx: 0,
      cy: 0,
      rx: 4,
      ry: 2,
    })
    expect(readShapeElement(element('text', {}))).toBeNull()
    expect(readShapeElement(element('path', { d: 'M0 0' }))).toBeNull()
  })
})

describe('isPrimitiveShapeKind', () => {
  it('recognizes the five primitive tags', () => {
    expect(['rect', 'circle', 'ellipse', 'polygon', 'polyline'].every(isPrimitiveShapeKind)).toBe(true)
    expect(isPrimitiveShapeKind('line')).toBe(false)
  })
})
