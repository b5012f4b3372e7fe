import OpenAI, { toFile } from 'openai'
import { SttError, toSttError } from '../core/errors.js'
import type { Logger } from '../core/logger.js'
import { describeError, silentLogger } from '../core/logger.js'
import { audioFileName } from '../core/pcm.js'
import type { TranscribeOptions, Transcriber, TranscriptionResult } from './index.js'

export interface OpenAiTranscriberConfig {
  apiKey: string
  /** Transcription model (default: 'whisper-1') */
  model?: string
  /** Override for OpenAI-compatible endpoints */
  baseURL?: string
}

/**
 * Transcriber backed by the OpenAI audio transcription API
 */
export class OpenAiTranscriber implements Transcriber {
  readonly name = 'openai'
  private openai: OpenAI
  private model: string
  private logger: Logger

  constructor(config: OpenAiTranscriberConfig, logger: Logger = silentLogger) {
    if (!config.apiKey) {
      throw new Error('OpenAI API key missing for STT')
    }

    this.openai = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL })
    this.model = config.model ?? 'whisper-1'
    this.logger = logger.child({ transcriber: this.name })
  }

  async transcribe(audio: Buffer, options: TranscribeOptions = {}): Promise<TranscriptionResult> {
    if (audio.length === 0) {
      return { ok: false, error: new SttError('transcription_failure', 'Empty audio block') }
    }

    try {
      const transcription = await this.openai.audio.transcriptions.create({
        file: await toFile(audio, audioFileName(audio)),
        model: this.model,
        language: options.language && options.language !== 'auto' ? options.language : undefined
      })

      return { ok: true, text: transcription.text.trim() }
    } catch (error) {
      this.logger.error('OpenAI STT error', { bytes: audio.length, ...describeError(error) })
      return { ok: false, error: toSttError(error) }
    }
  }
}
