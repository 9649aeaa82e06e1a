/**
 * Audio Types
 */

/**
 * A short fixed-duration slice of PCM16 mono audio at the pipeline rate
 */
export interface AudioFrame {
  /** Strictly increasing per call */
  sequence: number;
  samples: Int16Array;
  sampleRate: number;
  durationMs: number;
}

/**
 * How an utterance was closed
 */
export type UtteranceCloseReason = 'silence' | 'max-duration' | 'idle-timeout';

/**
 * Contiguous run of frames judged to be one spoken unit
 */
export interface Utterance {
  id: string;
  frames: AudioFrame[];
  durationMs: number;
  sampleRate: number;
  closedBy: UtteranceCloseReason;
}

export type SegmentEvent =
  | { type: 'speech-started' }
  | { type: 'speech-continuing' }
  | { type: 'utterance-ready'; utterance: Utterance }
  | { type: 'timeout'; utterance: Utterance };

export interface SegmentBufferConfig {
  /** Consecutive speech frames needed to open an utterance */
  speechDebounceFrames: number;
  /** Consecutive silence frames that close an open utterance */
  silenceTrailFrames: number;
  maxUtteranceMs: number;
  /** Idle frames kept so the first syllable is not clipped */
  preRollFrames: number;
}

export interface VoiceActivityDetector {
  isSpeech(frame: AudioFrame): boolean;
}

/**
 * Payload encodings accepted from the carrier
 */
export type AudioEncoding = 'mulaw' | 'pcm16';

export { MalformedFrameError } from './error.types';
