import { describe, it, expect, beforeEach } from 'vitest'
import { SegmentBuffer } from './segment-buffer.js'

const KB = 1024

function createClock() {
  let time = 0
  return {
    now: () => time,
    advance: (ms: number) => {
      time += ms
    }
  }
}

describe('SegmentBuffer', () => {
  let clock: ReturnType<typeof createClock>
  let buffer: SegmentBuffer

  beforeEach(() => {
    clock = createClock()
    buffer = new SegmentBuffer({
      minSegmentBytes: 30 * KB,
      silenceThresholdMs: 1_000,
      maxIntervalMs: 2_000,
      now: clock.now
    })
  })

  it('is never ready below the minimum segment size', () => {
    for (let i = 0; i < 29; i++) {
      buffer.addData(Buffer.alloc(KB))
      clock.advance(5_000)
      expect(buffer.isReady()).toBe(false)
    }

    expect(buffer.length).toBe(29 * KB)
  })

  it('treats the first crossing of the minimum size as an interim trigger', () => {
    buffer.addData(Buffer.alloc(30 * KB))

    expect(buffer.isReady()).toBe(true)
    const segment = buffer.extract()

    expect(segment?.isFinal).toBe(false)
    expect(segment?.audio.length).toBe(30 * KB)
    expect(buffer.length).toBe(30 * KB)
  })

  it('fires the silence trigger as a final segment and clears the buffer', () => {
    buffer.addData(Buffer.alloc(40 * KB))
    clock.advance(1_000)

    expect(buffer.isReady()).toBe(true)
    const segment = buffer.extract()

    expect(segment?.isFinal).toBe(true)
    expect(segment?.audio.length).toBe(40 * KB)
    expect(buffer.length).toBe(0)
    expect(buffer.isReady()).toBe(false)
  })

  it('fires the silence trigger only once per silence episode', () => {
    buffer.addData(Buffer.alloc(40 * KB))
    clock.advance(1_500)

    expect(buffer.isReady()).toBe(true)
    clock.advance(500)
    expect(buffer.isReady()).toBe(false)
    clock.advance(500)
    expect(buffer.isReady()).toBe(false)
  })

  it('starts a new silence episode once new audio arrives', () => {
    buffer.addData(Buffer.alloc(40 * KB))
    clock.advance(1_000)
    expect(buffer.isReady()).toBe(true)
    expect(buffer.extract()?.isFinal).toBe(true)

    buffer.addData(Buffer.alloc(35 * KB))
    clock.advance(1_200)

    expect(buffer.isReady()).toBe(true)
    expect(buffer.extract()?.isFinal).toBe(true)
  })

  it('fires interim triggers every maxInterval during continuous speech', () => {
    buffer.addData(Buffer.alloc(30 * KB))
    expect(buffer.isReady()).toBe(true)
    buffer.extract()

    for (let i = 0; i < 4; i++) {
      clock.advance(400)
      buffer.addData(Buffer.alloc(4 * KB))
      expect(buffer.isReady()).toBe(false)
    }

    clock.advance(400)
    buffer.addData(Buffer.alloc(4 * KB))

    expect(buffer.isReady()).toBe(true)
    const segment = buffer.extract()

    expect(segment?.isFinal).toBe(false)
    expect(segment?.audio.length).toBe(50 * KB)
    expect(buffer.length).toBe(50 * KB)
  })

  it('re-sends the growing prefix until the utterance ends', () => {
    const small = new SegmentBuffer({ minSegmentBytes: 3, silenceThresholdMs: 1_000, maxIntervalMs: 2_000, now: clock.now })

    small.addData(Buffer.from('abc'))
    expect(small.isReady()).toBe(true)
    expect(small.extract()?.audio.toString()).toBe('abc')

    clock.advance(300)
    small.addData(Buffer.from('def'))
    clock.advance(1_000)

    expect(small.isReady()).toBe(true)
    const segment = small.extract()
    expect(segment?.isFinal).toBe(true)
    expect(segment?.audio.toString()).toBe('abcdef')
  })

  it('returns a copy for interim segments', () => {
    const small = new SegmentBuffer({ minSegmentBytes: 3, now: clock.now })
    small.addData(Buffer.from('abc'))
    small.isReady()

    const segment = small.extract()
    segment?.audio.fill(0)

    expect(small.drainRemaining()?.audio.toString()).toBe('abc')
  })

  it('returns null when extracting from an empty buffer', () => {
    expect(buffer.extract()).toBeNull()
  })

  it('returns null when draining an empty buffer', () => {
    expect(buffer.drainRemaining()).toBeNull()
  })

  it('drains everything as a final segment regardless of thresholds', () => {
    buffer.addData(Buffer.from('hello '))
    buffer.addData(Buffer.from('world'))

    const segment = buffer.drainRemaining()

    expect(segment).toEqual({ audio: Buffer.from('hello world'), isFinal: true })
    expect(buffer.length).toBe(0)
    expect(buffer.drainRemaining()).toBeNull()
  })

  it('ignores empty appends', () => {
    buffer.addData(Buffer.alloc(40 * KB))
    clock.advance(900)
    buffer.addData(Buffer.alloc(0))
    clock.advance(100)

    expect(buffer.isReady()).toBe(true)
    expect(buffer.extract()?.isFinal).toBe(true)
  })

  it('forgets timing and data on reset', () => {
    buffer.addData(Buffer.alloc(30 * KB))
    expect(buffer.isReady()).toBe(true)
    buffer.reset()

    expect(buffer.length).toBe(0)
    buffer.addData(Buffer.alloc(30 * KB))
    expect(buffer.isReady()).toBe(true)
    expect(buffer.extract()?.isFinal).toBe(false)
  })
})
