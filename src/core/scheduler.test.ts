import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type { Segment } from '../types/index.js'
import { FakeTranscriber, flushPromises } from '../testing.js'
import { TranscriptionScheduler } from './scheduler.js'
import { SegmentBuffer } from './segment-buffer.js'
import { TranscriptAccumulator } from './transcript.js'

interface Update {
  text: string
  isFinal: boolean
}

describe('TranscriptionScheduler', () => {
  let time: number
  let buffer: SegmentBuffer
  let transcript: TranscriptAccumulator
  let updates: Update[]

  const onUpdate = (text: string, segment: Segment) => {
    updates.push({ text, isFinal: segment.isFinal })
  }

  function createScheduler(transcriber: FakeTranscriber): TranscriptionScheduler {
    return new TranscriptionScheduler(buffer, transcript, transcriber, { onUpdate })
  }

  beforeEach(() => {
    time = 0
    buffer = new SegmentBuffer({
      minSegmentBytes: 3,
      silenceThresholdMs: 1_000,
      maxIntervalMs: 2_000,
      now: () => time
    })
    transcript = new TranscriptAccumulator()
    updates = []
  })

  it('does nothing while the buffer is not ready', () => {
    const transcriber = new FakeTranscriber()
    const scheduler = createScheduler(transcriber)

    buffer.addData(Buffer.from('ab'))

    expect(scheduler.tick()).toBe(false)
    expect(transcriber.calls).toHaveLength(0)
  })

  it('appends final segments and emits the whole transcript', async () => {
    const transcriber = new FakeTranscriber(() => ({ ok: true, text: ' 世界 ' }))
    const scheduler = createScheduler(transcriber)
    transcript.append('你好')

    buffer.addData(Buffer.from('abc'))
    time = 1_000

    expect(scheduler.tick()).toBe(true)
    await flushPromises()

    expect(transcript.fullText()).toBe('你好世界')
    expect(updates).toEqual([{ text: '你好世界', isFinal: true }])
    expect(buffer.length).toBe(0)
  })

  it('emits interim previews without touching the transcript', async () => {
    const transcriber = new FakeTranscriber(() => ({ ok: true, text: '世' }))
    const scheduler = createScheduler(transcriber)
    transcript.append('你好')

    buffer.addData(Buffer.from('abc'))

    expect(scheduler.tick()).toBe(true)
    await flushPromises()

    expect(updates).toEqual([{ text: '你好世', isFinal: false }])
    expect(transcript.fullText()).toBe('你好')
    expect(buffer.length).toBe(3)
  })

  it('emits nothing for blank text', async () => {
    const transcriber = new FakeTranscriber(() => ({ ok: true, text: '   ' }))
    const scheduler = createScheduler(transcriber)

    buffer.addData(Buffer.from('abc'))
    time = 1_000
    scheduler.tick()
    await flushPromises()

    expect(updates).toEqual([])
    expect(transcript.segmentCount).toBe(0)
  })

  it('absorbs failed results and releases the in-flight flag', async () => {
    const transcriber = new FakeTranscriber()
    const scheduler = createScheduler(transcriber)

    buffer.addData(Buffer.from('abc'))
    scheduler.tick()
    expect(scheduler.isInFlight()).toBe(true)

    transcriber.rejectNext(new Error('model crashed'))
    await flushPromises()

    expect(scheduler.isInFlight()).toBe(false)
    expect(updates).toEqual([])

    time = 1_000
    expect(scheduler.tick()).toBe(true)
    expect(transcriber.calls).toHaveLength(2)
  })

  it('never starts a second transcription while one is in flight', async () => {
    const transcriber = new FakeTranscriber()
    const scheduler = createScheduler(transcriber)

    buffer.addData(Buffer.from('abc'))
    expect(scheduler.tick()).toBe(true)

    time = 2_500
    buffer.addData(Buffer.from('def'))
    time = 4_000

    expect(scheduler.tick()).toBe(false)
    expect(scheduler.tick()).toBe(false)
    expect(transcriber.calls).toHaveLength(1)

    transcriber.resolveNext({ ok: true, text: 'x' })
    await flushPromises()

    expect(scheduler.tick()).toBe(true)
    expect(transcriber.calls).toHaveLength(2)
    expect(transcriber.calls[1]?.toString()).toBe('abcdef')
  })

  it('waits for the in-flight call on stop and keeps its final text without emitting', async () => {
    const transcriber = new FakeTranscriber()
    const scheduler = createScheduler(transcriber)

    buffer.addData(Buffer.from('abc'))
    time = 1_000
    scheduler.tick()

    let stopped = false
    const stopping = scheduler.stop().then(() => {
      stopped = true
    })

    await flushPromises()
    expect(stopped).toBe(false)

    transcriber.resolveNext({ ok: true, text: 'late' })
    await stopping

    expect(stopped).toBe(true)
    expect(scheduler.isInFlight()).toBe(false)
    expect(transcript.fullText()).toBe('late')
    expect(updates).toEqual([])
    expect(scheduler.tick()).toBe(false)
  })

  describe('polling', () => {
    beforeEach(() => {
      vi.useFakeTimers()
    })

    afterEach(() => {
      vi.useRealTimers()
    })

    it('wakes on every poll interval until stopped', async () => {
      const clockBuffer = new SegmentBuffer({ minSegmentBytes: 3, silenceThresholdMs: 1_000, maxIntervalMs: 2_000 })
      const transcriber = new FakeTranscriber(() => ({ ok: true, text: 'x' }))
      const scheduler = new TranscriptionScheduler(clockBuffer, transcript, transcriber, { onUpdate }, { pollIntervalMs: 500 })

      clockBuffer.addData(Buffer.from('abc'))
      scheduler.start()
      expect(scheduler.isRunning()).toBe(true)

      await vi.advanceTimersByTimeAsync(1_000)

      expect(updates).toEqual([
        { text: 'x', isFinal: false },
        { text: 'x', isFinal: true }
      ])

      await scheduler.stop()
      expect(scheduler.isRunning()).toBe(false)
      expect(vi.getTimerCount()).toBe(0)
    })
  })
})
