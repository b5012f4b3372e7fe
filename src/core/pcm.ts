/**
 * Container formats recognised from their leading bytes
 */
export type AudioContainer = 'wav' | 'webm' | 'ogg' | 'mp3' | 'unknown'

/**
 * Sample layout of headerless PCM
 */
export interface PcmFormat {
  sampleRate: number
  channels: number
  bitsPerSample: number
}

/**
 * Layout expected from clients streaming raw PCM and produced by the ffmpeg conversion
 */
export const SPEECH_PCM_FORMAT: PcmFormat = { sampleRate: 16000, channels: 1, bitsPerSample: 16 }

/**
 * Build the 44-byte RIFF/WAVE header for `dataSize` bytes of PCM
 */
export function createWavHeader(dataSize: number, format: PcmFormat = SPEECH_PCM_FORMAT): Buffer {
  const { sampleRate, channels, bitsPerSample } = format
  const blockAlign = (channels * bitsPerSample) / 8
  const header = Buffer.alloc(44)

  header.write('RIFF', 0, 'ascii')
  header.writeUInt32LE(36 + dataSize, 4)
  header.write('WAVE', 8, 'ascii')
  header.write('fmt ', 12, 'ascii')
  header.writeUInt32LE(16, 16)
  header.writeUInt16LE(1, 20) // linear PCM
  header.writeUInt16LE(channels, 22)
  header.writeUInt32LE(sampleRate, 24)
  header.writeUInt32LE(sampleRate * blockAlign, 28)
  header.writeUInt16LE(blockAlign, 32)
  header.writeUInt16LE(bitsPerSample, 34)
  header.write('data', 36, 'ascii')
  header.writeUInt32LE(dataSize, 40)

  return header
}

/**
 * Wrap raw little-endian PCM in a WAV container
 */
export function wrapPcmToWav(pcm: Buffer, format: PcmFormat = SPEECH_PCM_FORMAT): Buffer {
  return Buffer.concat([createWavHeader(pcm.length, format), pcm])
}

/**
 * Guess the container of an audio block from its magic bytes
 */
export function detectContainer(audio: Buffer): AudioContainer {
  if (audio.length >= 12 && audio.toString('ascii', 0, 4) === 'RIFF' && audio.toString('ascii', 8, 12) === 'WAVE') {
    return 'wav'
  }

  if (audio.length >= 4 && audio.readUInt32BE(0) === 0x1a45dfa3) {
    return 'webm'
  }

  if (audio.length >= 4 && audio.toString('ascii', 0, 4) === 'OggS') {
    return 'ogg'
  }

  if (audio.length >= 3 && audio.toString('ascii', 0, 3) === 'ID3') {
    return 'mp3'
  }

  // MPEG audio frame sync
  if (audio.length >= 2 && audio[0] === 0xff && ((audio[1] ?? 0) & 0xe0) === 0xe0) {
    return 'mp3'
  }

  return 'unknown'
}

/**
 * File name to hand to tools that infer the format from the extension
 * Browsers stream MediaRecorder output, so unknown data is treated as webm.
 */
export function audioFileName(audio: Buffer, baseName: string = 'segment'): string {
  const container = detectContainer(audio)
  return `${baseName}.${container === 'unknown' ? 'webm' : container}`
}
