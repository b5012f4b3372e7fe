import { SttError, toSttError } from '../core/errors.js'
import type { Logger } from '../core/logger.js'
import { OpenAiTranscriber, type OpenAiTranscriberConfig } from './openai.js'
import { WhisperCppTranscriber, type WhisperCppConfig } from './whisper-cpp.js'

export { OpenAiTranscriber, type OpenAiTranscriberConfig } from './openai.js'
export { WhisperCppTranscriber, type WhisperCppConfig } from './whisper-cpp.js'

/**
 * Outcome of a single transcription call
 */
export type TranscriptionResult =
  | { ok: true; text: string }
  | { ok: false; error: SttError }

/**
 * Per-call transcription options
 */
export interface TranscribeOptions {
  /** Language hint, e.g. 'zh' or 'en' */
  language?: string
}

/**
 * Transcriber plugin interface
 * Converts a finite block of audio bytes to text
 *
 * Implementations are shared by every session and must accept concurrent calls.
 */
export interface Transcriber {
  /**
   * Plugin name for identification
   */
  name: string

  /**
   * Transcribe an audio block
   * @param audio Raw or container-encoded audio bytes
   */
  transcribe(audio: Buffer, options?: TranscribeOptions): Promise<TranscriptionResult>
}

/**
 * Backend selection
 */
export type TranscriberConfig =
  | ({ backend: 'whisper-cpp' } & WhisperCppConfig)
  | ({ backend: 'openai' } & OpenAiTranscriberConfig)

export type TranscriberBackend = TranscriberConfig['backend']

/**
 * Build the transcriber chosen at startup
 */
export function createTranscriber(config: TranscriberConfig, logger?: Logger): Transcriber {
  switch (config.backend) {
    case 'whisper-cpp':
      return new WhisperCppTranscriber(config, logger)
    case 'openai':
      return new OpenAiTranscriber(config, logger)
  }
}

/**
 * Call a transcriber, turning a thrown error into a failed result
 */
export async function transcribeSafely(
  transcriber: Transcriber,
  audio: Buffer,
  options: TranscribeOptions = {}
): Promise<TranscriptionResult> {
  try {
    return await transcriber.transcribe(audio, options)
  } catch (error) {
    return { ok: false, error: toSttError(error) }
  }
}
