/**
 * Audio Frame Decoder
 * Converts carrier media payloads (base64) into pipeline AudioFrames
 */

import { MalformedFrameError } from '../types';
import type { AudioEncoding, AudioFrame } from '../types';
import { CARRIER_SAMPLE_RATE, PIPELINE_SAMPLE_RATE } from '../constants/audio.constants';
import { bufferToSamples, decodeMuLaw, samplesToMs } from '../utils/pcm.utils';
import { audioResamplerService } from './audio-resampler.service';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export interface FrameDecoderOptions {
  /** Rate of the incoming payload */
  sourceSampleRate: number;
  /** Rate of the produced frames */
  targetSampleRate: number;
}

export class AudioFrameDecoder {
  private readonly options: FrameDecoderOptions;

  constructor(options: Partial<FrameDecoderOptions> = {}) {
    this.options = {
      sourceSampleRate: options.sourceSampleRate ?? CARRIER_SAMPLE_RATE,
      targetSampleRate: options.targetSampleRate ?? PIPELINE_SAMPLE_RATE,
    };
  }

  get targetSampleRate(): number {
    return this.options.targetSampleRate;
  }

  /**
   * Decode a base64 payload into a frame at the pipeline rate
   *
   * @throws MalformedFrameError for empty, non-base64 or truncated payloads
   */
  decode(payload: string, sequence: number, encoding: AudioEncoding = 'mulaw'): AudioFrame {
    if (!Number.isInteger(sequence) || sequence < 0) {
      throw new MalformedFrameError(`Invalid frame sequence: ${sequence}`, sequence);
    }

    const raw = this.decodeBase64(payload, sequence);
    const sourceSamples = this.toSamples(raw, encoding, sequence);
    const { sourceSampleRate, targetSampleRate } = this.options;

    return {
      sequence,
      samples: audioResamplerService.resample(sourceSamples, sourceSampleRate, targetSampleRate),
      sampleRate: targetSampleRate,
      durationMs: samplesToMs(sourceSamples.length, sourceSampleRate),
    };
  }

  private decodeBase64(payload: string, sequence: number): Buffer {
    if (payload.length === 0) {
      throw new MalformedFrameError('Empty media payload', sequence);
    }
    if (payload.length % 4 !== 0 || !BASE64_PATTERN.test(payload)) {
      throw new MalformedFrameError('Media payload is not valid base64', sequence);
    }

    const raw = Buffer.from(payload, 'base64');
    if (raw.length === 0) {
      throw new MalformedFrameError('Media payload decoded to no audio', sequence);
    }
    return raw;
  }

  private toSamples(raw: Buffer, encoding: AudioEncoding, sequence: number): Int16Array {
    if (encoding === 'mulaw') {
      return decodeMuLaw(raw);
    }
    if (raw.length % 2 !== 0) {
      throw new MalformedFrameError(
        `PCM16 payload has odd byte length ${raw.length}`,
        sequence
      );
    }
    return bufferToSamples(raw);
  }
}

// Default decoder for Twilio media (mu-law 8kHz → PCM16 16kHz)
export const audioFrameDecoder = new AudioFrameDecoder();
