import type { OutboundMessage, SessionTransport } from './types/index.js'
import type { Transcriber, TranscriptionResult } from './plugins/index.js'

export interface Deferred<T> {
  promise: Promise<T>
  resolve: (value: T) => void
  reject: (error: unknown) => void
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {}
  let reject: (error: unknown) => void = () => {}
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}

type Responder = (audio: Buffer, call: number) => TranscriptionResult | Promise<TranscriptionResult>

/**
 * In-memory transcriber for tests
 * Without a responder every call stays pending until settled with resolveNext/rejectNext.
 */
export class FakeTranscriber implements Transcriber {
  readonly name = 'fake'
  readonly calls: Buffer[] = []
  private pending: Array<Deferred<TranscriptionResult>> = []

  constructor(private readonly respond?: Responder) {}

  transcribe(audio: Buffer): Promise<TranscriptionResult> {
    this.calls.push(audio)

    if (this.respond) {
      return Promise.resolve(this.respond(audio, this.calls.length))
    }

    const call = deferred<TranscriptionResult>()
    this.pending.push(call)
    return call.promise
  }

  get pendingCount(): number {
    return this.pending.length
  }

  resolveNext(result: TranscriptionResult): void {
    const call = this.pending.shift()
    if (!call) {
      throw new Error('No pending transcription')
    }
    call.resolve(result)
  }

  rejectNext(error: unknown): void {
    const call = this.pending.shift()
    if (!call) {
      throw new Error('No pending transcription')
    }
    call.reject(error)
  }
}

/**
 * Transport that records every message while open
 */
export class RecordingTransport implements SessionTransport {
  readonly messages: OutboundMessage[] = []
  open = true

  sendJson(message: OutboundMessage): boolean {
    if (!this.open) {
      return false
    }

    this.messages.push(message)
    return true
  }

  types(): string[] {
    return this.messages.map((message) => message.type)
  }
}

/**
 * Let pending promise callbacks run
 */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}
