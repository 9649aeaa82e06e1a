/**
 * Voice Activity Detection
 * Energy threshold classifier over single frames
 */

import type { AudioFrame, VoiceActivityDetector } from '../types';
import { computeRms } from '../utils/pcm.utils';
import { vadConfig } from '../config/segment.config';

export class EnergyVoiceActivityDetector implements VoiceActivityDetector {
  readonly rmsThreshold: number;

  constructor(rmsThreshold: number = vadConfig.rmsThreshold) {
    if (!Number.isFinite(rmsThreshold) || rmsThreshold < 0) {
      throw new RangeError(`VAD threshold must be a non-negative number, got ${rmsThreshold}`);
    }
    this.rmsThreshold = rmsThreshold;
  }

  isSpeech(frame: AudioFrame): boolean {
    return computeRms(frame.samples) >= this.rmsThreshold;
  }
}
