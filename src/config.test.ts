import { describe, it, expect } from 'vitest'
import { loadConfig } from './config.js'

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    const config = loadConfig({})

    expect(config.websocket).toEqual({
      host: '0.0.0.0',
      port: 8765,
      path: '/',
      pingInterval: 15_000,
      maxPayload: 10 * 1024 * 1024
    })
    expect(config.session).toEqual({
      minSegmentBytes: 30 * 1024,
      silenceThresholdMs: 1_000,
      maxIntervalMs: 2_000,
      pollIntervalMs: 500,
      finalMinBytes: 10 * 1024,
      language: 'zh'
    })
    expect(config.transcriber).toEqual({
      backend: 'whisper-cpp',
      binaryPath: 'whisper-cli',
      modelPath: 'models/ggml-medium.bin',
      threads: 8,
      ffmpegPath: 'ffmpeg',
      inputFormat: 'auto',
      timeoutMs: 180_000
    })
    expect(config.verbose).toBe(false)
  })

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '9000',
      WS_PATH: '/stream',
      MIN_SEGMENT_BYTES: '16000',
      SILENCE_THRESHOLD_MS: '800',
      LANGUAGE: 'en',
      AUDIO_INPUT_FORMAT: 's16le',
      VERBOSE: 'true'
    })

    expect(config.websocket.port).toBe(9000)
    expect(config.websocket.path).toBe('/stream')
    expect(config.session.minSegmentBytes).toBe(16000)
    expect(config.session.silenceThresholdMs).toBe(800)
    expect(config.session.language).toBe('en')
    expect(config.transcriber).toMatchObject({ backend: 'whisper-cpp', inputFormat: 's16le' })
    expect(config.verbose).toBe(true)
  })

  it('falls back to defaults for unparsable numbers', () => {
    const config = loadConfig({ PORT: 'abc', POLL_INTERVAL_MS: '-5' })

    expect(config.websocket.port).toBe(8765)
    expect(config.session.pollIntervalMs).toBe(500)
  })

  it('selects the OpenAI backend', () => {
    const config = loadConfig({ STT_BACKEND: 'openai', OPENAI_API_KEY: 'test-key' })

    expect(config.transcriber).toEqual({
      backend: 'openai',
      apiKey: 'test-key',
      model: 'whisper-1',
      baseURL: undefined
    })
  })

  it('treats an unknown backend as whisper-cpp', () => {
    expect(loadConfig({ STT_BACKEND: 'vosk' }).transcriber.backend).toBe('whisper-cpp')
  })
})
