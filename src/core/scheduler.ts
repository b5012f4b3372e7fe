import type { Segment } from '../types/index.js'
import { transcribeSafely, type Transcriber } from '../plugins/index.js'
import type { SttErrorKind } from './errors.js'
import type { Logger } from './logger.js'
import { describeError, silentLogger } from './logger.js'
import type { SegmentBuffer } from './segment-buffer.js'
import type { TranscriptAccumulator } from './transcript.js'

/**
 * Scheduler configuration
 */
export interface SchedulerConfig {
  /** Wake-up interval in ms (default: 500) */
  pollIntervalMs?: number
  /** Language hint passed to the transcriber */
  language?: string
}

/**
 * Scheduler callbacks
 */
export interface SchedulerCallbacks {
  /**
   * Called with the cumulative transcript after a segment was transcribed
   * For interim segments the text is the finalized transcript plus the preview.
   */
  onUpdate: (text: string, segment: Segment) => void
}

/**
 * Transcription Scheduler
 * Polls a session's SegmentBuffer and runs at most one transcription at a time
 */
export class TranscriptionScheduler {
  private timer: NodeJS.Timeout | null = null
  private inFlight: Promise<void> | null = null
  private cancelled = false
  private config: Required<SchedulerConfig>
  private logger: Logger

  constructor(
    private readonly buffer: SegmentBuffer,
    private readonly transcript: TranscriptAccumulator,
    private readonly transcriber: Transcriber,
    private readonly callbacks: SchedulerCallbacks,
    config: SchedulerConfig = {},
    logger: Logger = silentLogger
  ) {
    this.config = {
      pollIntervalMs: 500,
      language: 'zh',
      ...config
    }
    this.logger = logger
  }

  /**
   * Start polling
   */
  start(): void {
    if (this.timer) {
      return
    }

    this.cancelled = false
    this.timer = setInterval(() => {
      this.tick()
    }, this.config.pollIntervalMs)
  }

  /**
   * Whether a transcription call is outstanding
   */
  isInFlight(): boolean {
    return this.inFlight !== null
  }

  /**
   * Whether the scheduler has been started and not stopped
   */
  isRunning(): boolean {
    return this.timer !== null
  }

  /**
   * Run one scheduling step
   * @returns true when a transcription was started
   */
  tick(): boolean {
    if (this.cancelled) {
      return false
    }

    if (this.inFlight) {
      this.logger.debug('Transcription in flight, skipping tick')
      return false
    }

    if (!this.buffer.isReady()) {
      return false
    }

    const segment = this.buffer.extract()
    if (!segment) {
      return false
    }

    this.logger.debug('Transcribing segment', { bytes: segment.audio.length, isFinal: segment.isFinal })

    this.inFlight = this.process(segment).finally(() => {
      this.inFlight = null
    })
    return true
  }

  /**
   * Stop polling and wait for an outstanding call to finish
   */
  async stop(): Promise<void> {
    this.cancelled = true

    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }

    if (this.inFlight) {
      this.logger.debug('Waiting for in-flight transcription before stopping')
      await this.inFlight
    }
  }

  private async process(segment: Segment): Promise<void> {
    const result = await transcribeSafely(this.transcriber, segment.audio, { language: this.config.language })

    if (!result.ok) {
      this.logger.warn('Segment transcription failed', {
        bytes: segment.audio.length,
        isFinal: segment.isFinal,
        kind: result.error.kind,
        error: result.error.message
      })
      return
    }

    const text = result.text.trim()
    if (!text) {
      this.logger.debug('Empty transcription, nothing to emit', { isFinal: segment.isFinal })
      return
    }

    // A final segment has already left the buffer, so its text is kept even after cancellation
    if (segment.isFinal) {
      this.transcript.append(text)
    }

    if (this.cancelled) {
      this.logger.debug('Scheduler stopped during transcription, not emitting update', {
        kind: 'cancellation_race' satisfies SttErrorKind,
        isFinal: segment.isFinal
      })
      return
    }

    const cumulative = segment.isFinal ? this.transcript.fullText() : this.transcript.fullText() + text

    try {
      this.callbacks.onUpdate(cumulative, segment)
    } catch (error) {
      this.logger.error('Error in onUpdate callback', describeError(error))
    }
  }
}
