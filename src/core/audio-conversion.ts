import { execFile } from 'child_process'
import { promisify } from 'util'
import { promises as fsPromises } from 'fs'
import { join } from 'path'
import type { Logger } from './logger.js'
import { silentLogger } from './logger.js'
import { audioFileName, SPEECH_PCM_FORMAT } from './pcm.js'

const execFileAsync = promisify(execFile)

/**
 * Configuration for audio conversion
 */
export interface ConversionConfig {
  /** Path to ffmpeg binary (defaults to 'ffmpeg' in PATH) */
  ffmpegPath?: string
  /** Target sample rate for conversion */
  targetSampleRate?: number
  /** Directory for the intermediate files (must exist) */
  workDir: string
  /** Kill ffmpeg after this many ms (default: 60000) */
  timeoutMs?: number
}

/**
 * Convert an arbitrary audio block to 16-bit mono WAV using FFmpeg
 * The container is probed by FFmpeg; the input file extension is only a hint.
 * @returns Path of the written WAV file
 */
export async function convertToWavFile(
  audio: Buffer,
  config: ConversionConfig,
  logger: Logger = silentLogger
): Promise<string> {
  const {
    ffmpegPath = 'ffmpeg',
    targetSampleRate = SPEECH_PCM_FORMAT.sampleRate,
    workDir,
    timeoutMs = 60_000
  } = config

  const inputPath = join(workDir, audioFileName(audio, 'input'))
  const outputPath = join(workDir, 'converted.wav')

  await fsPromises.writeFile(inputPath, audio)

  const args = [
    '-hide_banner',
    '-loglevel', 'error',
    '-y',
    '-i', inputPath,
    '-ar', String(targetSampleRate),
    '-ac', String(SPEECH_PCM_FORMAT.channels),
    '-acodec', 'pcm_s16le',
    outputPath
  ]

  logger.debug(`Executing: ${ffmpegPath} ${args.join(' ')}`)

  const { stderr } = await execFileAsync(ffmpegPath, args, { timeout: timeoutMs })

  if (stderr.trim()) {
    logger.debug('FFmpeg stderr', { stderr: stderr.trim() })
  }

  return outputPath
}
