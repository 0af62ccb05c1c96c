/**
 * Color Math
 *
 * Hue arithmetic on the 360° circle plus HSL/hex conversion through chroma-js.
 * Pure functions, no state.
 */

import chroma from 'chroma-js'

export type Rgb = [number, number, number]

/**
 * Wrap any angle into [0, 360)
 */
export function wrapHue(hue: number): number {
  const wrapped = hue % 360
  const positive = wrapped < 0 ? wrapped + 360 : wrapped
  // -1e-15 % 360 + 360 rounds to exactly 360
  return positive >= 360 ? 0 : positive
}

/**
 * Shortest distance between two hues on the circle, in [0, 180]
 */
export function circularHueDistance(h1: number, h2: number): number {
  const delta = Math.abs(wrapHue(h1) - wrapHue(h2))
  return Math.min(delta, 360 - delta)
}

/**
 * 1 for identical hues, 0 for opposite hues
 */
export function hueSimilarity(h1: number, h2: number): number {
  return 1 - circularHueDistance(h1, h2) / 180
}

/**
 * HSL to 0-255 integer RGB
 *
 * @param saturation - percent, clamped to 0-100
 * @param lightness - percent, clamped to 0-100
 */
export function hslToRgb(hue: number, saturation: number, lightness: number): Rgb {
  const s = Math.min(100, Math.max(0, saturation)) / 100
  const l = Math.min(100, Math.max(0, lightness)) / 100
  const [r, g, b] = chroma.hsl(wrapHue(hue), s, l).rgb()
  return [r, g, b]
}

export function hexToRgb(hex: string): Rgb {
  const [r, g, b] = chroma(hex).rgb()
  return [r, g, b]
}
