// Badge geometry for a given pixel size, kept apart from drawing so it can be checked as numbers.
// Angles are degrees, 0 = east, increasing clockwise (y grows downward).
import { lerpColor, palette, type Rgba } from './palette.js'

export const ICON_SIZES = [16, 32, 48, 64, 128, 256] as const
export const PREVIEW_SIZE = 256
export const DOT_MIN_SIZE = 48

export type GradientRing = { radius: number; color: Rgba }
export type Arc = { radius: number; start: number; end: number }
export type Bar = { x: number; top: number; width: number; height: number }

export type IconLayout = {
  size: number
  center: number
  gradient: GradientRing[]
  border: { inset: number; width: number }
  arcWidth: number
  arcs: { inner: Arc; outer: Arc }
  baseline: number
  bars: Bar[]
  dot?: { x: number; y: number; diameter: number }
}

const BAR_HEIGHTS = [0.12, 0.18, 0.24]

export function iconLayout(size: number): IconLayout {
  if (!Number.isInteger(size) || size <= 0) throw new RangeError(`icon size must be a positive integer, got ${size}`)
  const floor = Math.floor
  const center = floor(size / 2)
  const half = floor(size / 2)

  // Largest first; each smaller disc overdraws the previous one
  const gradient: GradientRing[] = []
  for (let r = half; r > 0; r--) {
    gradient.push({ radius: r, color: lerpColor(palette.bgDark, palette.bgLight, r / half) })
  }

  const barWidth = Math.max(2, floor(size * 0.06))
  const spacing = floor(size * 0.08)
  const baseline = floor(center + size * 0.15)
  const left = floor(center - size * 0.12)
  const bars = BAR_HEIGHTS.map((k, i): Bar => {
    const height = floor(size * k)
    return { x: left + i * spacing, top: baseline - height, width: barWidth, height }
  })

  const layout: IconLayout = {
    size,
    center,
    gradient,
    border: { inset: 2, width: Math.max(1, floor(size / 32)) },
    arcWidth: Math.max(2, floor(size / 20)),
    arcs: {
      inner: { radius: floor(size * 0.25), start: -135, end: -45 },
      outer: { radius: floor(size * 0.35), start: 45, end: 135 }
    },
    baseline,
    bars
  }
  if (size >= DOT_MIN_SIZE) {
    layout.dot = {
      x: floor(center + size * 0.2),
      y: floor(center - size * 0.25),
      diameter: Math.max(2, floor(size * 0.06))
    }
  }
  return layout
}
