import 'dotenv/config'
import { serve } from '@hono/node-server'
import { loadConfig } from './config'
import { createApp, createServices } from './index'
import { describeCause } from './services/errors'

function main(): void {
  const config   = loadConfig()
  const services = createServices(config)
  const app      = createApp(services)

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    console.info(`[Server] Ensemble Mind listening on http://${info.address}:${info.port}`)
  })

  let closing = false
  const shutdown = (signal: string): void => {
    if (closing) return
    closing = true
    console.info(`[Server] ${signal} received, draining enrichment queue...`)
    server.close()
    const drained = services.enrichment ? services.enrichment.drain() : Promise.resolve()
    drained
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('[Server] drain failed:', describeCause(err))
        process.exit(1)
      })
  }

  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))
}

try {
  main()
} catch (err) {
  console.error('[Server] startup failed:', describeCause(err))
  process.exit(1)
}
