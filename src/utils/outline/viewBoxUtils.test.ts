import { describe, expect, it } from 'vitest'
import { parseDimension, parseLengthWithUnit, parseViewBox, resolveViewBox } from './viewBoxUtils'

describe('parseViewBox', () => {
  it('accepts space and comma separators', () => {
    expect(parseViewBox('0 0 200 100')).toEqual({ minX: 0, minY: 0, width: 200, height: 100 })
    expect(parseViewBox(' -10,-5, 20 ,10 ')).toEqual({ minX: -10, minY: -5, width: 20, height: 10 })
  })

  it('rejects anything but four numbers', () => {
    expect(parseViewBox(null)).toBeNull()
    expect(parseViewBox('')).toBeNull()
    expect(parseViewBox('0 0 200')).toBeNull()
    expect(parseViewBox('0 0 wide tall')).toBeNull()
  })
})

describe('parseLengthWithUnit', () => {
  it('splits the number from its unit', () => {
    expect(parseLengthWithUnit('100mm')).toEqual({ value: 100, unit: 'mm' })
    expect(parseLengthWithUnit('2.5e1 PX')).toEqual({ value: 25, unit: 'px' })
    expect(parseLengthWithUnit('50%')).toEqual({ value: 50, unit: '%' })
    expect(parseLengthWithUnit('auto')).toBeNull()
  })
})

describe('parseDimension', () => {
  it('strips units and falls back to the default', () => {
    expect(parseDimension('100mm')).toBe(100)
    expect(parseDimension('12.5in')).toBe(12.5)
    expect(parseDimension(null)).toBe(100)
    expect(parseDimension('auto', 64)).toBe(64)
  })
})

describe('resolveViewBox', () => {
  it('prefers the declared viewBox', () => {
    expect(resolveViewBox({ viewBox: '5 5 10 10', width: '300', height: '150' })).toEqual({
      minX: 5,
      minY: 5,
      width: 10,
      height: 10,
    })
  })

  it('spans the declared size otherwise', () => {
    expect(resolveViewBox({ viewBox: null, width: '300', height: '150pt' })).toEqual({
      minX: 0,
      minY: 0,
      width: 300,
      height: 150,
    })
    expect(resolveViewBox({ viewBox: 'broken', width: null, height: null })).toEqual({
      minX: 0,
      minY: 0,
      width: 100,
      height: 100,
    })
  })
})
