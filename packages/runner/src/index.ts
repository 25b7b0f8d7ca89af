import { loadConfig } from './config'
import { failureCount, startMods, stopMods } from './run'

function waitForShutdown(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    process.once('SIGINT', resolve)
    process.once('SIGTERM', resolve)
  })
}

async function main() {
  const config = loadConfig()
  console.log(`[Runner] Loading mods from ${config.modPath}`)
  const session = startMods(config)

  if (config.keepRunning) {
    console.log('[Runner] Running until SIGINT or SIGTERM')
    const signal = await waitForShutdown()
    console.log(`[Runner] ${signal} received, stopping mods`)
  }

  const summary = stopMods(session)
  const failures = failureCount(summary)
  if (failures > 0) {
    console.error(`[Runner] ${failures} mod script or hook failures`)
    process.exitCode = 1
  }
}

main().catch((err) => {
  console.error('[Runner] Fatal error:', err)
  process.exit(1)
})
