import type { Segment } from '../types/index.js'

/**
 * Segmentation thresholds
 */
export interface SegmentBufferConfig {
  /** Below this many buffered bytes no segment is ever ready (default: 30KB) */
  minSegmentBytes?: number
  /** Time without new data that ends an utterance, in ms (default: 1000) */
  silenceThresholdMs?: number
  /** Maximum time between interim segments during continuous speech, in ms (default: 2000) */
  maxIntervalMs?: number
  /** Clock used for all timing decisions (default: Date.now) */
  now?: () => number
}

/**
 * Segment Buffer
 * Accumulates one session's audio and decides where segments end
 *
 * All operations are synchronous, so appends and extractions never interleave
 * on the event loop.
 */
export class SegmentBuffer {
  private chunks: Buffer[] = []
  private size = 0
  private lastDataAt: number | null = null
  private lastTriggerAt: number | null = null
  private pendingFinal = false
  // lastDataAt value of the silence episode that already produced a final trigger
  private silenceEpisode: number | null = null
  private config: Required<SegmentBufferConfig>

  constructor(config: SegmentBufferConfig = {}) {
    this.config = {
      minSegmentBytes: 30 * 1024,
      silenceThresholdMs: 1_000,
      maxIntervalMs: 2_000,
      now: () => Date.now(),
      ...config
    }
  }

  /**
   * Append audio bytes
   */
  addData(data: Buffer): void {
    if (data.length === 0) {
      return
    }

    this.chunks.push(data)
    this.size += data.length
    this.lastDataAt = this.config.now()
  }

  /**
   * Number of buffered bytes
   */
  get length(): number {
    return this.size
  }

  /**
   * Whether a segment boundary has been reached
   * Records whether the next extract() is final or interim.
   */
  isReady(): boolean {
    if (this.size < this.config.minSegmentBytes) {
      return false
    }

    const now = this.config.now()

    if (
      this.lastDataAt !== null &&
      this.silenceEpisode !== this.lastDataAt &&
      now - this.lastDataAt >= this.config.silenceThresholdMs
    ) {
      this.pendingFinal = true
      this.silenceEpisode = this.lastDataAt
      this.lastTriggerAt = now
      return true
    }

    if (this.lastTriggerAt === null || now - this.lastTriggerAt >= this.config.maxIntervalMs) {
      this.pendingFinal = false
      this.lastTriggerAt = now
      return true
    }

    return false
  }

  /**
   * Take the current segment
   * Final segments clear the buffer, interim ones leave it untouched so the
   * next extraction covers the whole utterance again.
   * @returns null when there is no data
   */
  extract(): Segment | null {
    if (this.size === 0) {
      return null
    }

    const audio = this.collapse()

    if (this.pendingFinal) {
      this.clearPending()
      return { audio, isFinal: true }
    }

    return { audio: Buffer.from(audio), isFinal: false }
  }

  /**
   * Take whatever remains as a final segment, regardless of thresholds
   * @returns null when there is no data
   */
  drainRemaining(): Segment | null {
    if (this.size === 0) {
      return null
    }

    const audio = this.collapse()
    this.clearPending()
    return { audio, isFinal: true }
  }

  /**
   * Drop all data and timing state
   */
  reset(): void {
    this.clearPending()
    this.lastDataAt = null
    this.lastTriggerAt = null
    this.silenceEpisode = null
  }

  private collapse(): Buffer {
    if (this.chunks.length !== 1) {
      this.chunks = [Buffer.concat(this.chunks, this.size)]
    }

    const [audio] = this.chunks
    return audio ?? Buffer.alloc(0)
  }

  private clearPending(): void {
    this.chunks = []
    this.size = 0
    this.pendingFinal = false
  }
}
