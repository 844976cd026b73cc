import { loadSettings } from './config/settings.js'
import { buildApp } from './app.js'

const settings = loadSettings()
const { app } = await buildApp({ settings })

function isAddressInUse(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EADDRINUSE'
}

async function listenWithFallback(startPort: number) {
  const attempts = 10
  for (let i = 0; i <= attempts; i++) {
    const tryPort = startPort + i
    try {
      await app.listen({ port: tryPort, host: settings.host })
      app.log.info(`API listening on http://localhost:${tryPort} (workspace=${settings.workspaceRoot})`)
      return
    } catch (err) {
      if (!isAddressInUse(err)) {
        app.log.error({ err }, `Failed to start server on port ${tryPort}`)
        throw err
      }
      app.log.warn(`Port ${tryPort} in use. Trying next...`)
    }
  }
  // Last resort: let OS choose an ephemeral port
  await app.listen({ port: 0, host: settings.host })
  const addr = app.server.address()
  const chosen = typeof addr === 'object' && addr ? addr.port : '(unknown)'
  app.log.warn(`All ports ${startPort}-${startPort + attempts} busy. Using ephemeral port ${chosen}.`)
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, 'Shutting down; cancelling running jobs')
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, 'Shutdown failed')
        process.exit(1)
      }
    )
  })
}

await listenWithFallback(settings.port)
