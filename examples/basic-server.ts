/**
 * Basic stream-stt-server example
 *
 * Runs the server with a stub transcriber that reports how much audio it was
 * given, which is enough to watch segmentation and scheduling at work without
 * installing a speech model.
 */

import { ConsoleLogger, StreamingSttServer } from '../src/index.js'
import type { Transcriber } from '../src/index.js'

// Example transcriber (stub implementation)
const transcriber: Transcriber = {
  name: 'example-transcriber',
  async transcribe(audio) {
    await new Promise((resolve) => setTimeout(resolve, 300))
    return { ok: true, text: `[${audio.length} bytes]` }
  }
}

const logger = new ConsoleLogger({ verbose: true })

// Create and start the server
const server = new StreamingSttServer({
  websocket: {
    port: 8765,
    host: '0.0.0.0'
  },
  session: {
    minSegmentBytes: 30 * 1024,
    silenceThresholdMs: 1_000,
    maxIntervalMs: 2_000,
    pollIntervalMs: 500
  },
  transcriber,
  logger
})

await server.start()

logger.info('Streaming STT server is running, press Ctrl+C to stop')

// Graceful shutdown
process.on('SIGINT', () => {
  logger.info('Shutting down...')
  server.stop().then(
    () => process.exit(0),
    (error: unknown) => {
      console.error(error)
      process.exit(1)
    }
  )
})
