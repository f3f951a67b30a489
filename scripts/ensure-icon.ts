// Build app.ico only when it is missing (app start-up hook); the preview is left alone
// Usage: npm run ensure-icon [-- outDir]
import { resolveConfig } from '../src/config.js'
import { loadRenderer } from '../src/deps.js'
import { logError } from '../src/log.js'

const config = resolveConfig(process.argv.slice(2), process.env)

try {
  const { ensureIconExists } = await loadRenderer()
  await ensureIconExists(config.outDir, { logLevel: config.logLevel })
} catch (e) {
  logError('icon:failed', e, { outDir: config.outDir })
  process.exitCode = 1
}
