import 'dotenv/config'
import { createServer } from 'node:http'
import { loadConfig } from './config'
import { createApp } from './app'
import { log } from '../lib/log'

process.on('unhandledRejection', (reason) => {
  console.error('[process] Unhandled Rejection:', reason)
})

try {
  const config = loadConfig()
  const httpServer = createServer(createApp(config))

  const shutdown = (signal: string) => {
    log(`received ${signal}, shutting down`, 'process')
    httpServer.close(() => process.exit(0))
  }
  process.on('SIGTERM', () => shutdown('SIGTERM'))
  process.on('SIGINT', () => shutdown('SIGINT'))

  httpServer.listen(config.port, '0.0.0.0', () => {
    log(`serving on port ${config.port}`)
  })
} catch (error) {
  console.error('Failed to start server:', error)
  process.exit(1)
}
