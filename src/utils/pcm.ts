/**
 * Raw audio is carried as signed 16-bit little-endian mono PCM. Offsets are counted in frames so
 * placing, slicing and padding never accumulate floating point drift.
 */

export interface PcmFormat {
  sampleRate: number
}

export const BYTES_PER_FRAME = 2

export function framesOf(samples: Buffer): number {
  return Math.floor(samples.length / BYTES_PER_FRAME)
}

export function secondsToFrames(seconds: number, format: PcmFormat): number {
  return Math.round(seconds * format.sampleRate)
}

export function durationOf(samples: Buffer, format: PcmFormat): number {
  return framesOf(samples) / format.sampleRate
}

export function silence(frames: number): Buffer {
  return Buffer.alloc(Math.max(0, frames) * BYTES_PER_FRAME)
}

/** Frames in [start, end) seconds, clamped to the buffer. */
export function sliceSeconds(samples: Buffer, start: number, end: number, format: PcmFormat): Buffer {
  const total = framesOf(samples)
  const from = Math.min(total, Math.max(0, secondsToFrames(start, format)))
  const to = Math.min(total, Math.max(from, secondsToFrames(end, format)))
  return samples.subarray(from * BYTES_PER_FRAME, to * BYTES_PER_FRAME)
}

/** RIFF/WAVE container around PCM samples. */
export function encodeWav(samples: Buffer, format: PcmFormat): Buffer {
  const dataLength = framesOf(samples) * BYTES_PER_FRAME
  const header = Buffer.alloc(44)
  header.write('RIFF', 0, 'ascii')
  header.writeUInt32LE(36 + dataLength, 4)
  header.write('WAVE', 8, 'ascii')
  header.write('fmt ', 12, 'ascii')
  header.writeUInt32LE(16, 16) // fmt chunk size
  header.writeUInt16LE(1, 20) // PCM
  header.writeUInt16LE(1, 22) // mono
  header.writeUInt32LE(format.sampleRate, 24)
  header.writeUInt32LE(format.sampleRate * BYTES_PER_FRAME, 28)
  header.writeUInt16LE(BYTES_PER_FRAME, 32)
  header.writeUInt16LE(16, 34)
  header.write('data', 36, 'ascii')
  header.writeUInt32LE(dataLength, 40)
  return Buffer.concat([header, samples.subarray(0, dataLength)])
}
