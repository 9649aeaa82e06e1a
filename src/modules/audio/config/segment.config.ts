/**
 * Segmentation Configuration
 * Voice activity and utterance boundary settings
 */

import type { SegmentBufferConfig } from '../types';

export const segmentConfig: SegmentBufferConfig = {
  speechDebounceFrames: parseInt(process.env.SEGMENT_SPEECH_DEBOUNCE_FRAMES || '3', 10),
  // 25 frames of 20ms = 500ms of trailing silence
  silenceTrailFrames: parseInt(process.env.SEGMENT_SILENCE_TRAIL_FRAMES || '25', 10),
  maxUtteranceMs: parseInt(process.env.SEGMENT_MAX_UTTERANCE_MS || '20000', 10),
  preRollFrames: parseInt(process.env.SEGMENT_PRE_ROLL_FRAMES || '10', 10),
};

export const vadConfig = {
  // RMS over PCM16 samples; telephony line noise sits well below this
  rmsThreshold: parseInt(process.env.VAD_RMS_THRESHOLD || '500', 10),
} as const;
