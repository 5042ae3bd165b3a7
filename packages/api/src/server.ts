// ---------------------------------------------------------------------------
// Node entry point
//
// Loads configuration from the environment, opens the configured store and
// serves the Hono app with @hono/node-server. SIGINT/SIGTERM stop accepting
// connections, then close the store.
// ---------------------------------------------------------------------------

import { serve } from '@hono/node-server'
import { MutationPolicy } from '@user-registry/domain'
import { createApp } from './app'
import { loadConfig } from './config'
import { openStore } from './db'

async function main(): Promise<void> {
  const config = loadConfig()
  const { store, close } = await openStore(config)
  const policy = new MutationPolicy(store, { timeoutMs: config.storeTimeoutMs })
  const app = createApp({
    users: policy,
    authSecret: config.authSecret,
    logRequests: config.nodeEnv !== 'test',
  })

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    console.log(`User registry listening on http://localhost:${info.port} (store: ${config.store.kind})`)
  })

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`)
    server.close(() => {
      close().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error('Failed to close the store:', err)
          process.exit(1)
        },
      )
    })
  }
  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))
}

main().catch((err: unknown) => {
  console.error('Server failed to start:', err)
  process.exit(1)
})
