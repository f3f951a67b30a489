// Badge colours. Alpha is 0..255 like the channels.

export type Rgb = { r: number; g: number; b: number }
export type Rgba = Rgb & { a: number }

export const palette = {
  bgDark: { r: 20, g: 55, b: 90, a: 255 },
  bgLight: { r: 26, g: 82, b: 118, a: 255 },
  scan: { r: 200, g: 230, b: 255, a: 180 },
  chart: { r: 100, g: 200, b: 150, a: 220 },
  border: { r: 255, g: 255, b: 255, a: 100 },
  accent: { r: 255, g: 255, b: 255, a: 200 }
} satisfies Record<string, Rgba>

// ratio 0 -> a, ratio 1 -> b; channels truncate
export const lerpColor = (a: Rgb, b: Rgb, ratio: number): Rgba => ({
  r: Math.trunc(a.r * (1 - ratio) + b.r * ratio),
  g: Math.trunc(a.g * (1 - ratio) + b.g * ratio),
  b: Math.trunc(a.b * (1 - ratio) + b.b * ratio),
  a: 255
})

export const toCss = (c: Rgba, opts?: { opaque?: boolean }): string => {
  if (opts?.opaque || c.a >= 255) return `rgb(${c.r}, ${c.g}, ${c.b})`
  return `rgba(${c.r}, ${c.g}, ${c.b}, ${c.a / 255})`
}
