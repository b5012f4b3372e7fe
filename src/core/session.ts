import type { OutboundMessage, SessionState, SessionTransport } from '../types/index.js'
import { transcribeSafely, type Transcriber } from '../plugins/index.js'
import type { SttErrorKind } from './errors.js'
import type { Logger } from './logger.js'
import { describeError, silentLogger } from './logger.js'
import { finalMessage, parseControlMessage, partialMessage } from './protocol.js'
import { TranscriptionScheduler } from './scheduler.js'
import { SegmentBuffer } from './segment-buffer.js'
import { TranscriptAccumulator } from './transcript.js'

/**
 * Segmentation and scheduling settings for a session
 */
export interface SessionConfig {
  /** Bytes needed before a segment may be transcribed (default: 30KB) */
  minSegmentBytes?: number
  /** Silence that ends an utterance, in ms (default: 1000) */
  silenceThresholdMs?: number
  /** Maximum time between interim transcriptions, in ms (default: 2000) */
  maxIntervalMs?: number
  /** Scheduler wake-up interval, in ms (default: 500) */
  pollIntervalMs?: number
  /** Leftover audio at stop is transcribed only when larger than this (default: 10KB) */
  finalMinBytes?: number
  /** Language hint for the transcriber (default: 'zh') */
  language?: string
}

/**
 * Streaming Session
 * Owns one connection's buffer, transcript and scheduler and maps protocol
 * commands onto them
 */
export class StreamingSession {
  readonly sessionId: string
  private state: SessionState = 'idle'
  private readonly buffer: SegmentBuffer
  private readonly transcript = new TranscriptAccumulator()
  private scheduler: TranscriptionScheduler | null = null
  // start/stop run one after another in arrival order
  private commands: Promise<void> = Promise.resolve()
  private queuedCommands = 0
  // audio received after the latest queued start, replayed once it has run
  private heldAudio: Buffer[] | null = null
  private config: Required<SessionConfig>
  private logger: Logger

  constructor(
    sessionId: string,
    private readonly transport: SessionTransport,
    private readonly transcriber: Transcriber,
    config: SessionConfig = {},
    logger: Logger = silentLogger
  ) {
    this.sessionId = sessionId
    this.config = {
      minSegmentBytes: 30 * 1024,
      silenceThresholdMs: 1_000,
      maxIntervalMs: 2_000,
      pollIntervalMs: 500,
      finalMinBytes: 10 * 1024,
      language: 'zh',
      ...config
    }
    this.logger = logger.child({ sessionId })
    this.buffer = new SegmentBuffer({
      minSegmentBytes: this.config.minSegmentBytes,
      silenceThresholdMs: this.config.silenceThresholdMs,
      maxIntervalMs: this.config.maxIntervalMs
    })
  }

  getState(): SessionState {
    return this.state
  }

  /**
   * Finalized transcript so far
   */
  getTranscript(): string {
    return this.transcript.fullText()
  }

  /**
   * Bytes waiting in the segment buffer
   */
  getBufferedBytes(): number {
    return this.buffer.length
  }

  /**
   * Handle a binary audio frame
   * Never waits on transcription. Audio that follows a queued start is held
   * for the new session; audio that follows a queued stop is dropped.
   */
  handleAudio(data: Buffer): void {
    if (this.state === 'closed') {
      return
    }

    if (this.heldAudio) {
      this.heldAudio.push(data)
      return
    }

    if (this.queuedCommands > 0 || this.state === 'closing') {
      this.logger.warn('Dropping audio received while session is closing', { bytes: data.length })
      return
    }

    if (this.state === 'idle') {
      this.logger.info('Audio stream started without start command')
      this.activate()
    }

    this.buffer.addData(data)
  }

  /**
   * Handle a text frame carrying a JSON control command
   */
  handleText(raw: string): Promise<void> {
    const parsed = parseControlMessage(raw)

    if (!parsed.ok) {
      this.logger.warn('Ignoring control message', { kind: parsed.error.kind, error: parsed.error.message })
      return Promise.resolve()
    }

    switch (parsed.command) {
      case 'start':
        return this.start()
      case 'stop':
        return this.stop()
      case 'ping':
        this.ping()
        return Promise.resolve()
    }
  }

  /**
   * Begin a fresh session on this connection
   */
  start(): Promise<void> {
    const held: Buffer[] = []
    this.heldAudio = held

    return this.enqueue(async () => {
      if (this.scheduler) {
        this.logger.info('Restarting active session')
        await this.stopScheduler()
      }

      if (this.heldAudio === held) {
        this.heldAudio = null
      }

      if (this.isClosed()) {
        return
      }

      this.activate()
      this.send({ type: 'session_started' })
      this.logger.info('Session started', { heldChunks: held.length })

      for (const chunk of held) {
        this.buffer.addData(chunk)
      }
    })
  }

  /**
   * Flush remaining audio, send the final transcript and return to idle
   */
  stop(): Promise<void> {
    this.heldAudio = null
    return this.enqueue(() => this.finish())
  }

  ping(): void {
    this.send({ type: 'pong' })
  }

  /**
   * Connection lost: stop transcribing and release the session
   * Nothing is sent after this point. Resolves once queued commands and any
   * outstanding transcription have finished.
   */
  async close(): Promise<void> {
    if (this.state === 'closed') {
      return
    }

    this.state = 'closed'
    this.heldAudio = null
    await this.stopScheduler()
    await this.commands
    this.buffer.reset()
    this.logger.info('Session closed', { kind: 'connection_lost' satisfies SttErrorKind })
  }

  private activate(): void {
    this.buffer.reset()
    this.transcript.clear()

    this.scheduler = new TranscriptionScheduler(
      this.buffer,
      this.transcript,
      this.transcriber,
      { onUpdate: (text) => this.send(partialMessage(text)) },
      { pollIntervalMs: this.config.pollIntervalMs, language: this.config.language },
      this.logger
    )
    this.scheduler.start()
    this.state = 'active'
  }

  private async finish(): Promise<void> {
    if (this.isClosed()) {
      return
    }

    this.state = 'closing'
    await this.stopScheduler()

    const remaining = this.buffer.drainRemaining()

    if (remaining && remaining.audio.length > this.config.finalMinBytes) {
      this.logger.info('Transcribing final segment', { bytes: remaining.audio.length })
      const result = await transcribeSafely(this.transcriber, remaining.audio, { language: this.config.language })

      if (result.ok) {
        this.transcript.append(result.text.trim())
      } else {
        this.logger.warn('Final segment transcription failed', {
          kind: result.error.kind,
          error: result.error.message
        })
      }
    } else if (remaining) {
      this.logger.debug('Discarding short remainder', { bytes: remaining.audio.length })
    }

    if (this.isClosed()) {
      return
    }

    const fullText = this.transcript.fullText()
    this.send(finalMessage(fullText))
    this.send({ type: 'session_ended' })
    this.state = 'idle'
    this.logger.info('Session ended', { characters: fullText.length })
  }

  private async stopScheduler(): Promise<void> {
    const scheduler = this.scheduler
    this.scheduler = null

    if (scheduler) {
      await scheduler.stop()
    }
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    this.queuedCommands++
    const run = this.commands.then(task).finally(() => {
      this.queuedCommands--
    })
    this.commands = run.catch((error: unknown) => {
      this.logger.error('Session command failed', describeError(error))
    })
    return run
  }

  private isClosed(): boolean {
    return this.state === 'closed'
  }

  private send(message: OutboundMessage): boolean {
    if (this.state === 'closed') {
      return false
    }

    return this.transport.sendJson(message)
  }
}
