import { execFile } from 'child_process'
import { promisify } from 'util'
import { promises as fsPromises } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { convertToWavFile } from '../core/audio-conversion.js'
import { SttError, toSttError } from '../core/errors.js'
import type { Logger } from '../core/logger.js'
import { describeError, silentLogger } from '../core/logger.js'
import { wrapPcmToWav } from '../core/pcm.js'
import type { TranscribeOptions, Transcriber, TranscriptionResult } from './index.js'

const execFileAsync = promisify(execFile)

/**
 * How incoming audio bytes are encoded
 * 'auto' lets FFmpeg probe the container, 's16le' is headerless 16kHz mono PCM.
 */
export type AudioInputFormat = 'auto' | 's16le'

export interface WhisperCppConfig {
  /** whisper.cpp CLI binary (default: 'whisper-cli') */
  binaryPath?: string
  /** Path to the ggml model file */
  modelPath: string
  /** Inference threads (default: 8) */
  threads?: number
  /** Path to ffmpeg binary (default: 'ffmpeg') */
  ffmpegPath?: string
  /** Encoding of the incoming audio (default: 'auto') */
  inputFormat?: AudioInputFormat
  /** Kill a run that takes longer than this, in ms (default: 180000) */
  timeoutMs?: number
}

/**
 * Transcriber backed by the whisper.cpp command line tool
 * Each call works in its own temporary directory, so sessions may call it concurrently.
 */
export class WhisperCppTranscriber implements Transcriber {
  readonly name = 'whisper-cpp'
  private config: Required<WhisperCppConfig>
  private logger: Logger

  constructor(config: WhisperCppConfig, logger: Logger = silentLogger) {
    this.config = {
      binaryPath: 'whisper-cli',
      threads: 8,
      ffmpegPath: 'ffmpeg',
      inputFormat: 'auto',
      timeoutMs: 180_000,
      ...config
    }
    this.logger = logger.child({ transcriber: this.name })
  }

  async transcribe(audio: Buffer, options: TranscribeOptions = {}): Promise<TranscriptionResult> {
    if (audio.length === 0) {
      return { ok: false, error: new SttError('transcription_failure', 'Empty audio block') }
    }

    const workDir = await fsPromises.mkdtemp(join(tmpdir(), 'stream-stt-'))

    try {
      const wavPath = await this.prepareWav(audio, workDir)
      const text = await this.run(wavPath, workDir, options.language)
      return { ok: true, text }
    } catch (error) {
      this.logger.error('whisper.cpp transcription failed', { bytes: audio.length, ...describeError(error) })
      return { ok: false, error: toSttError(error) }
    } finally {
      await fsPromises.rm(workDir, { recursive: true, force: true }).catch((error: unknown) => {
        this.logger.warn('Failed to clean up temp directory', { workDir, ...describeError(error) })
      })
    }
  }

  private async prepareWav(audio: Buffer, workDir: string): Promise<string> {
    if (this.config.inputFormat === 's16le') {
      const wavPath = join(workDir, 'input.wav')
      this.logger.debug('Wrapping raw PCM', { bytes: audio.length })
      await fsPromises.writeFile(wavPath, wrapPcmToWav(audio))
      return wavPath
    }

    return convertToWavFile(audio, { ffmpegPath: this.config.ffmpegPath, workDir }, this.logger)
  }

  private async run(wavPath: string, workDir: string, language: string | undefined): Promise<string> {
    const outputBase = join(workDir, 'transcript')
    const args = [
      '--file', wavPath,
      '--model', this.config.modelPath,
      '--threads', String(this.config.threads),
      '--no-timestamps',
      '--output-txt',
      '--output-file', outputBase
    ]

    if (language && language !== 'auto') {
      args.push('--language', language)
    }

    this.logger.debug(`Running whisper.cpp: ${this.config.binaryPath} ${args.join(' ')}`)

    const { stdout } = await execFileAsync(this.config.binaryPath, args, {
      timeout: this.config.timeoutMs,
      maxBuffer: 16 * 1024 * 1024
    })

    try {
      const fromFile = await fsPromises.readFile(`${outputBase}.txt`, 'utf8')
      return normalizeWhisperOutput(fromFile)
    } catch (error) {
      this.logger.debug('No transcript file, using stdout', describeError(error))
      return normalizeWhisperOutput(stdout)
    }
  }
}

/**
 * Join whisper.cpp output lines into one string
 */
export function normalizeWhisperOutput(raw: string): string {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join(' ')
    .trim()
}
