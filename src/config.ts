/**
 * Central configuration. All env vars are read here so the rest of the server
 * stays env-agnostic and testable.
 */
import dotenv from 'dotenv'
import type { SessionConfig } from './core/session.js'
import type { WebSocketConfig } from './core/websocket.js'
import type { TranscriberBackend, TranscriberConfig } from './plugins/index.js'
import type { AudioInputFormat } from './plugins/whisper-cpp.js'

export interface ServerConfig {
  websocket: WebSocketConfig
  session: Required<SessionConfig>
  transcriber: TranscriberConfig
  verbose: boolean
}

type Env = Record<string, string | undefined>

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback
  }

  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed
}

const parseBoolOrDefault = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback
  }

  return value.toLowerCase() === 'true' || value === '1'
}

const resolveBackend = (value: string | undefined): TranscriberBackend => {
  if (value === 'openai') {
    return 'openai'
  }

  return 'whisper-cpp'
}

const resolveInputFormat = (value: string | undefined): AudioInputFormat => {
  if (value === 's16le') {
    return 's16le'
  }

  return 'auto'
}

const resolveTranscriber = (env: Env): TranscriberConfig => {
  const backend = resolveBackend(env.STT_BACKEND)

  if (backend === 'openai') {
    return {
      backend,
      apiKey: env.OPENAI_API_KEY ?? '',
      model: env.OPENAI_STT_MODEL || 'whisper-1',
      baseURL: env.OPENAI_BASE_URL || undefined
    }
  }

  return {
    backend,
    binaryPath: env.WHISPER_CPP_BIN || 'whisper-cli',
    modelPath: env.WHISPER_CPP_MODEL || 'models/ggml-medium.bin',
    threads: parseIntOrDefault(env.WHISPER_CPP_THREADS, 8),
    ffmpegPath: env.FFMPEG_PATH || 'ffmpeg',
    inputFormat: resolveInputFormat(env.AUDIO_INPUT_FORMAT),
    timeoutMs: parseIntOrDefault(env.TRANSCRIBE_TIMEOUT_MS, 180_000)
  }
}

/**
 * Build the server configuration from environment variables
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  return {
    websocket: {
      host: env.HOST || '0.0.0.0',
      port: parseIntOrDefault(env.PORT, 8765),
      path: env.WS_PATH || '/',
      pingInterval: parseIntOrDefault(env.PING_INTERVAL_MS, 15_000),
      maxPayload: parseIntOrDefault(env.MAX_PAYLOAD_BYTES, 10 * 1024 * 1024)
    },
    session: {
      minSegmentBytes: parseIntOrDefault(env.MIN_SEGMENT_BYTES, 30 * 1024),
      silenceThresholdMs: parseIntOrDefault(env.SILENCE_THRESHOLD_MS, 1_000),
      maxIntervalMs: parseIntOrDefault(env.MAX_INTERVAL_MS, 2_000),
      pollIntervalMs: parseIntOrDefault(env.POLL_INTERVAL_MS, 500),
      finalMinBytes: parseIntOrDefault(env.FINAL_MIN_BYTES, 10 * 1024),
      language: env.LANGUAGE || 'zh'
    },
    transcriber: resolveTranscriber(env),
    verbose: parseBoolOrDefault(env.VERBOSE, false)
  }
}

/**
 * Load a .env file from the working directory into process.env
 */
export function loadEnvFile(): void {
  dotenv.config()
}
