// Run settings: output directory from argv, log level from the environment
import { resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { parseLevel, type Level } from './log.js'

export type Config = {
  outDir: string
  logLevel: Level
}

export const DEFAULT_OUT_DIR = fileURLToPath(new URL('../Resources', import.meta.url))

export const resolveConfig = (argv: readonly string[], env: Record<string, string | undefined>): Config => {
  const [outDirArg] = argv
  return {
    outDir: outDirArg ? resolve(outDirArg) : DEFAULT_OUT_DIR,
    logLevel: parseLevel(env.LOG_LEVEL)
  }
}
