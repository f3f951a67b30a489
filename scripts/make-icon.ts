// Generate the application icon (app.ico + app_preview.png)
// Usage: npm run make-icon [-- outDir]
// Progress goes to stdout as JSON lines (icon:wrote per file, icon:failed on error)
import { resolveConfig } from '../src/config.js'
import { logError } from '../src/log.js'
import { makeIcons } from '../src/main.js'

const config = resolveConfig(process.argv.slice(2), process.env)

try {
  await makeIcons(config)
} catch (e) {
  logError('icon:failed', e, { outDir: config.outDir })
  process.exitCode = 1
}
