/**
 * Test WebSocket client for stream-stt-server
 *
 * Streams an audio file in small chunks as if it came from a microphone:
 *   npx tsx examples/test-client.ts recording.webm [ws://localhost:8765]
 */

import { readFileSync } from 'fs'
import WebSocket from 'ws'

const [filePath, wsUrl = 'ws://localhost:8765'] = process.argv.slice(2)

if (!filePath) {
  console.error('Usage: test-client.ts <audio-file> [ws-url]')
  process.exit(1)
}

const audio = readFileSync(filePath)
const CHUNK_BYTES = 4096
const CHUNK_INTERVAL_MS = 100

console.log(`Connecting to: ${wsUrl}`)
const ws = new WebSocket(wsUrl)

ws.on('open', () => {
  console.log('✓ Connected to server')
  ws.send(JSON.stringify({ command: 'start' }))

  let offset = 0
  const timer = setInterval(() => {
    if (offset >= audio.length) {
      clearInterval(timer)
      console.log('All audio sent, stopping session')
      ws.send(JSON.stringify({ command: 'stop' }))
      return
    }

    ws.send(audio.subarray(offset, offset + CHUNK_BYTES))
    offset += CHUNK_BYTES
  }, CHUNK_INTERVAL_MS)
})

ws.on('message', (data: WebSocket.RawData) => {
  const message: unknown = JSON.parse(data.toString())
  console.log('← Server message:', message)

  if (typeof message === 'object' && message !== null && 'type' in message && message.type === 'session_ended') {
    ws.close()
  }
})

ws.on('error', (error) => {
  console.error('✗ WebSocket error:', error.message)
})

ws.on('close', () => {
  console.log('✗ Connection closed')
  process.exit(0)
})
