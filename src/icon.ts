// Badge renderer: draws the icon at one size and packages frames into app.ico / a PNG preview
import { access, mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { createCanvas, type Canvas, type SKRSContext2D } from '@napi-rs/canvas'
import { IoFailureError } from './errors.js'
import { encodeIco, type IcoFrame } from './ico.js'
import { ICON_SIZES, iconLayout } from './layout.js'
import { log, shouldLog } from './log.js'
import { palette, toCss, type Rgba } from './palette.js'

export type BuildOpts = {
  logLevel?: string
}

export const ICON_FILE = 'app.ico'
export const PREVIEW_FILE = 'app_preview.png'

const rad = (deg: number) => (deg * Math.PI) / 180

// Translucent colours replace the pixels under the current path instead of blending over them
const paint = (ctx: SKRSContext2D, color: Rgba, apply: (style: string) => void) => {
  if (color.a < 255) {
    ctx.globalCompositeOperation = 'destination-out'
    apply('#000')
    ctx.globalCompositeOperation = 'source-over'
  }
  apply(toCss(color))
}

const fillPath = (ctx: SKRSContext2D, color: Rgba) =>
  paint(ctx, color, (style) => {
    ctx.fillStyle = style
    ctx.fill()
  })

const strokePath = (ctx: SKRSContext2D, color: Rgba, width: number) =>
  paint(ctx, color, (style) => {
    ctx.strokeStyle = style
    ctx.lineWidth = width
    ctx.stroke()
  })

// Strokes sit inside the circle: the outer edge lies on `radius`
const strokeArc = (ctx: SKRSContext2D, cx: number, cy: number, radius: number, startDeg: number, endDeg: number, width: number, color: Rgba) => {
  ctx.beginPath()
  ctx.arc(cx, cy, Math.max(0, radius - width / 2), rad(startDeg), rad(endDeg))
  strokePath(ctx, color, width)
}

const fillCircle = (ctx: SKRSContext2D, cx: number, cy: number, radius: number, color: Rgba) => {
  ctx.beginPath()
  ctx.arc(cx, cy, radius, 0, Math.PI * 2)
  fillPath(ctx, color)
}

export function renderAtSize(size: number): Canvas {
  const layout = iconLayout(size)
  const canvas = createCanvas(size, size)
  const ctx = canvas.getContext('2d')
  const c = layout.center

  for (const ring of layout.gradient) fillCircle(ctx, c, c, ring.radius, ring.color)

  const { inset, width: borderWidth } = layout.border
  strokeArc(ctx, c, c, size / 2 - inset, 0, 360, borderWidth, palette.border)

  const scan = { ...palette.scan, a: 255 }
  for (const arc of [layout.arcs.inner, layout.arcs.outer]) {
    strokeArc(ctx, c, c, arc.radius, arc.start, arc.end, layout.arcWidth, scan)
  }

  ctx.fillStyle = toCss(palette.chart, { opaque: true })
  for (const bar of layout.bars) ctx.fillRect(bar.x, bar.top, bar.width, bar.height)

  if (layout.dot) {
    const r = layout.dot.diameter / 2
    fillCircle(ctx, layout.dot.x + r, layout.dot.y + r, r, palette.accent)
  }
  return canvas
}

export const encodePng = (canvas: Canvas): Buffer => canvas.toBuffer('image/png')

const writeOut = async (path: string, data: Buffer, opts?: BuildOpts) => {
  try {
    await writeFile(path, data)
  } catch (e) {
    throw new IoFailureError('write', path, e)
  }
  if (shouldLog('info', opts?.logLevel)) log('info', 'icon:wrote', { path, bytes: data.length })
}

export async function buildIconContainer(sizes: readonly number[], outputPath: string, opts?: BuildOpts): Promise<void> {
  const ordered = [...new Set(sizes)].sort((a, b) => a - b)
  const frames: IcoFrame[] = ordered.map((size) => {
    const data = encodePng(renderAtSize(size))
    if (shouldLog('debug', opts?.logLevel)) log('debug', 'icon:frame', { size, bytes: data.length })
    return { size, data }
  })
  await writeOut(outputPath, encodeIco(frames), opts)
}

export async function buildPreview(size: number, outputPath: string, opts?: BuildOpts): Promise<void> {
  await writeOut(outputPath, encodePng(renderAtSize(size)), opts)
}

export async function ensureOutDir(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true })
  } catch (e) {
    throw new IoFailureError('mkdir', dir, e)
  }
}

const exists = async (path: string): Promise<boolean> => {
  try {
    await access(path)
    return true
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return false
    throw new IoFailureError('stat', path, e)
  }
}

// Builds app.ico only when it is missing; true when a file was written
export async function ensureIconExists(outDir: string, opts?: BuildOpts): Promise<boolean> {
  await ensureOutDir(outDir)
  const iconPath = join(outDir, ICON_FILE)
  if (await exists(iconPath)) {
    if (shouldLog('info', opts?.logLevel)) log('info', 'icon:skip', { path: iconPath })
    return false
  }
  await buildIconContainer(ICON_SIZES, iconPath, opts)
  return true
}
