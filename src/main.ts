// Writes app.ico (every standard size) and app_preview.png into the configured directory
import { join } from 'node:path'
import type { Config } from './config.js'
import { loadRenderer } from './deps.js'
import { ICON_SIZES, PREVIEW_SIZE } from './layout.js'

export type MakeIconsResult = { iconPath: string; previewPath: string }

export async function makeIcons(config: Config): Promise<MakeIconsResult> {
  const { buildIconContainer, buildPreview, ensureOutDir, ICON_FILE, PREVIEW_FILE } = await loadRenderer()
  const opts = { logLevel: config.logLevel }
  await ensureOutDir(config.outDir)

  const iconPath = join(config.outDir, ICON_FILE)
  await buildIconContainer(ICON_SIZES, iconPath, opts)

  const previewPath = join(config.outDir, PREVIEW_FILE)
  await buildPreview(PREVIEW_SIZE, previewPath, opts)
  return { iconPath, previewPath }
}
