// The renderer pulls in a native rasteriser; load it lazily so a broken install fails with a named package
import { MissingDependencyError } from './errors.js'

export const RASTERISER = '@napi-rs/canvas'

export type Renderer = typeof import('./icon.js')

export const isMissingModule = (err: unknown): boolean => {
  if (!(err instanceof Error)) return false
  if ('code' in err && (err.code === 'ERR_MODULE_NOT_FOUND' || err.code === 'MODULE_NOT_FOUND')) return err.message.includes(RASTERISER)
  return /native binding/i.test(err.message)
}

export async function loadRenderer(importRenderer: () => Promise<Renderer> = () => import('./icon.js')): Promise<Renderer> {
  try {
    return await importRenderer()
  } catch (e) {
    if (isMissingModule(e)) throw new MissingDependencyError(RASTERISER, e)
    throw e
  }
}
