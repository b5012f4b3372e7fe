#!/usr/bin/env node
import { loadConfig, loadEnvFile } from './config.js'
import { ConsoleLogger, describeError } from './core/logger.js'
import { createTranscriber } from './plugins/index.js'
import { StreamingSttServer } from './index.js'

async function main(): Promise<void> {
  loadEnvFile()
  const config = loadConfig()
  const logger = new ConsoleLogger({ verbose: config.verbose })

  const transcriber = createTranscriber(config.transcriber, logger)
  const server = new StreamingSttServer({
    websocket: config.websocket,
    session: config.session,
    transcriber,
    logger
  })

  await server.start()

  let stopping = false
  const shutdown = (signal: string) => {
    if (stopping) {
      return
    }
    stopping = true
    logger.info(`Received ${signal}, shutting down`)
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Error during shutdown', describeError(error))
        process.exit(1)
      }
    )
  }

  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))
}

main().catch((error: unknown) => {
  console.error('[stream-stt] Failed to start:', error)
  process.exit(1)
})
