/**
 * Carrier audio encoding
 * Synthesized PCM16 → 8kHz mu-law → base64 payloads of one 20ms frame each
 */

import {
  audioResamplerService,
  bufferToSamples,
  encodeMuLaw,
  splitIntoChunks,
  CARRIER_FRAME_BYTES,
  CARRIER_SAMPLE_RATE,
} from '@/modules/audio';

export function encodeForCarrier(pcm: Buffer, sampleRate: number): string[] {
  if (pcm.length === 0) {
    return [];
  }

  const samples = audioResamplerService.resample(
    bufferToSamples(pcm),
    sampleRate,
    CARRIER_SAMPLE_RATE
  );

  return splitIntoChunks(encodeMuLaw(samples), CARRIER_FRAME_BYTES).map((frame) =>
    frame.toString('base64')
  );
}
