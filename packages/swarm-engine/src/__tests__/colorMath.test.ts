import { describe, expect, it } from 'vitest'
import {
  circularHueDistance,
  hexToRgb,
  hslToRgb,
  hueSimilarity,
  wrapHue,
} from '../color/colorMath'

describe('wrapHue', () => {
  it('should wrap angles into [0, 360)', () => {
    expect(wrapHue(370)).toBe(10)
    expect(wrapHue(-30)).toBe(330)
    expect(wrapHue(360)).toBe(0)
    expect(wrapHue(0)).toBe(0)
  })

  it('should never return 360 for tiny negative angles', () => {
    expect(wrapHue(-1e-15)).toBe(0)
  })
})

describe('hue similarity', () => {
  it('should measure distance the short way around the circle', () => {
    expect(circularHueDistance(350, 10)).toBe(20)
    expect(circularHueDistance(0, 180)).toBe(180)
    expect(circularHueDistance(90, 90)).toBe(0)
  })

  it('should be 1 for equal hues and 0 for opposite hues', () => {
    expect(hueSimilarity(10, 10)).toBe(1)
    expect(hueSimilarity(0, 180)).toBe(0)
    expect(hueSimilarity(350, 10)).toBeCloseTo(1 - 20 / 180, 12)
  })

  it('should be symmetric', () => {
    expect(hueSimilarity(30, 200)).toBe(hueSimilarity(200, 30))
  })
})

describe('hslToRgb', () => {
  it('should convert primary hues at full saturation', () => {
    expect(hslToRgb(0, 100, 50)).toEqual([255, 0, 0])
    expect(hslToRgb(120, 100, 50)).toEqual([0, 255, 0])
    expect(hslToRgb(240, 100, 50)).toEqual([0, 0, 255])
  })

  it('should produce black at zero lightness', () => {
    expect(hslToRgb(200, 80, 0)).toEqual([0, 0, 0])
  })
})

describe('hexToRgb', () => {
  it('should parse six digit hex colours', () => {
    expect(hexToRgb('#ff8000')).toEqual([255, 128, 0])
    expect(hexToRgb('#000000')).toEqual([0, 0, 0])
  })
})
