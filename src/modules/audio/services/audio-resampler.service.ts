/**
 * Audio Resampler Service
 * Handles audio sample rate conversion using wave-resampler
 *
 * Stateless: each resample() call is independent. Used inbound
 * (carrier 8kHz → pipeline 16kHz) and outbound (synthesis rate → carrier 8kHz).
 */

import { resample } from 'wave-resampler';
import { logger } from '@/shared/utils/logger';
import { MAX_SAMPLE_RATE, MIN_SAMPLE_RATE } from '../constants/audio.constants';

class AudioResamplerServiceClass {
  /**
   * Resample PCM16 samples between two rates
   *
   * Algorithm: wave-resampler's linear interpolation without low-pass filter.
   * Fast enough for 20ms frames and fine for telephony-grade speech.
   *
   * @throws RangeError when either rate is outside 8kHz-48kHz
   */
  resample(samples: Int16Array, sourceSampleRate: number, targetSampleRate: number): Int16Array {
    this.assertRate(sourceSampleRate);
    this.assertRate(targetSampleRate);

    // Passthrough: nothing to convert
    if (sourceSampleRate === targetSampleRate || samples.length === 0) {
      return samples;
    }

    const output = resample(samples, sourceSampleRate, targetSampleRate, {
      method: 'linear',
      LPF: false,
    });

    // wave-resampler returns floating point samples; clamp back into Int16 range
    const result = new Int16Array(output.length);
    for (let i = 0; i < output.length; i++) {
      result[i] = Math.max(-32768, Math.min(32767, Math.round(output[i])));
    }

    logger.debug('Resampled audio', {
      sourceSampleRate,
      targetSampleRate,
      inputSamples: samples.length,
      outputSamples: result.length,
    });

    return result;
  }

  /**
   * Expected sample count after resampling
   *
   * @example
   * audioResamplerService.getExpectedSampleCount(160, 8000, 16000); // 320
   */
  getExpectedSampleCount(sampleCount: number, sourceSampleRate: number, targetSampleRate: number): number {
    return Math.floor((sampleCount * targetSampleRate) / sourceSampleRate);
  }

  private assertRate(sampleRate: number): void {
    if (!Number.isFinite(sampleRate) || sampleRate < MIN_SAMPLE_RATE || sampleRate > MAX_SAMPLE_RATE) {
      throw new RangeError(
        `Sample rate ${sampleRate} outside supported range ${MIN_SAMPLE_RATE}-${MAX_SAMPLE_RATE} Hz`
      );
    }
  }
}

// Export singleton instance
export const audioResamplerService = new AudioResamplerServiceClass();

export { AudioResamplerServiceClass };
