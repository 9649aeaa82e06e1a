/**
 * PCM Utilities
 * G.711 mu-law codec, signal energy, WAV container and frame splitting
 */

import { BYTES_PER_SAMPLE } from '../constants/audio.constants';

const MULAW_BIAS = 0x84;
const MULAW_CLIP = 32635;

/**
 * Decode one G.711 mu-law byte to a linear PCM16 sample
 */
export function muLawToLinear(byte: number): number {
  const value = ~byte & 0xff;
  const sign = value & 0x80;
  const exponent = (value >> 4) & 0x07;
  const mantissa = value & 0x0f;
  const magnitude = (((mantissa << 3) + MULAW_BIAS) << exponent) - MULAW_BIAS;
  return sign ? -magnitude : magnitude;
}

/**
 * Encode one linear PCM16 sample as a G.711 mu-law byte
 */
export function linearToMuLaw(sample: number): number {
  const sign = (sample >> 8) & 0x80;
  let magnitude = sign ? -sample : sample;
  if (magnitude > MULAW_CLIP) {
    magnitude = MULAW_CLIP;
  }
  magnitude += MULAW_BIAS;

  let exponent = 7;
  for (let mask = 0x4000; (magnitude & mask) === 0 && exponent > 0; mask >>= 1) {
    exponent--;
  }

  const mantissa = (magnitude >> (exponent + 3)) & 0x0f;
  return ~(sign | (exponent << 4) | mantissa) & 0xff;
}

export function decodeMuLaw(data: Buffer): Int16Array {
  const samples = new Int16Array(data.length);
  for (let i = 0; i < data.length; i++) {
    samples[i] = muLawToLinear(data[i]);
  }
  return samples;
}

export function encodeMuLaw(samples: Int16Array): Buffer {
  const out = Buffer.alloc(samples.length);
  for (let i = 0; i < samples.length; i++) {
    out[i] = linearToMuLaw(samples[i]);
  }
  return out;
}

/**
 * Read little-endian PCM16 from a buffer.
 * Copies, so the result never aliases a pooled or unaligned Buffer.
 */
export function bufferToSamples(data: Buffer): Int16Array {
  const count = Math.floor(data.length / BYTES_PER_SAMPLE);
  const samples = new Int16Array(count);
  for (let i = 0; i < count; i++) {
    samples[i] = data.readInt16LE(i * BYTES_PER_SAMPLE);
  }
  return samples;
}

export function samplesToBuffer(samples: Int16Array): Buffer {
  const out = Buffer.alloc(samples.length * BYTES_PER_SAMPLE);
  for (let i = 0; i < samples.length; i++) {
    out.writeInt16LE(samples[i], i * BYTES_PER_SAMPLE);
  }
  return out;
}

export function concatSamples(chunks: readonly Int16Array[]): Int16Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const out = new Int16Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/**
 * Root mean square of the samples (0 for an empty array)
 */
export function computeRms(samples: Int16Array): number {
  if (samples.length === 0) {
    return 0;
  }
  let sumSquares = 0;
  for (let i = 0; i < samples.length; i++) {
    sumSquares += samples[i] * samples[i];
  }
  return Math.sqrt(sumSquares / samples.length);
}

/**
 * Wrap raw PCM16 mono audio in a 44-byte RIFF/WAVE header
 */
export function wrapInWav(pcm: Buffer, sampleRate: number, channels = 1): Buffer {
  const header = Buffer.alloc(44);
  const byteRate = sampleRate * channels * BYTES_PER_SAMPLE;

  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(channels * BYTES_PER_SAMPLE, 32);
  header.writeUInt16LE(16, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}

/**
 * Split a buffer into consecutive slices of `size` bytes; the last may be shorter
 */
export function splitIntoChunks(data: Buffer, size: number): Buffer[] {
  if (size <= 0) {
    throw new RangeError(`Chunk size must be positive, got ${size}`);
  }
  const chunks: Buffer[] = [];
  for (let offset = 0; offset < data.length; offset += size) {
    chunks.push(data.subarray(offset, Math.min(offset + size, data.length)));
  }
  return chunks;
}

/**
 * Duration in milliseconds of `sampleCount` samples
 */
export function samplesToMs(sampleCount: number, sampleRate: number): number {
  return (sampleCount * 1000) / sampleRate;
}
