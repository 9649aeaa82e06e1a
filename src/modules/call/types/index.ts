/**
 * Call Types
 */

import type { SegmentBufferConfig, VoiceActivityDetector } from '@/modules/audio';
import type { TranscriptionAdapter } from '@/modules/stt';
import type { ResponseAdapter } from '@/modules/llm';
import type { SynthesisAdapter } from '@/modules/tts';

export type CallIdentifier = string;

export enum CallState {
  IDLE = 'idle',
  LISTENING = 'listening',
  TRANSCRIBING = 'transcribing',
  GENERATING = 'generating',
  SYNTHESIZING = 'synthesizing',
  SPEAKING = 'speaking',
  ENDED = 'ended',
}

/**
 * Items handed to the transport, in playback order
 */
export type OutboundItem =
  | { type: 'audio'; generationId: number; index: number; audio: Buffer; sampleRate: number }
  | { type: 'end-of-turn'; generationId: number }
  | { type: 'clear'; generationId: number };

export interface CallSessionConfig {
  segment: SegmentBufferConfig;
  /** Utterances shorter than this are discarded before transcription */
  minUtteranceMs: number;
  /** Close an open utterance when no frame arrives for this long */
  idleFlushMs: number;
  /** Abort a turn that has not finished within this time */
  turnDeadlineMs: number;
  /** Synthesize reply fragments while the reply is still being generated */
  streamingSynthesis: boolean;
  bargeInEnabled: boolean;
  /** Closed utterances waiting behind the current turn */
  maxPendingUtterances: number;
}

export interface CallSessionDependencies {
  transcriber: TranscriptionAdapter;
  responder: ResponseAdapter;
  synthesizer: SynthesisAdapter;
  vad?: VoiceActivityDetector;
}

export interface CallSessionMetrics {
  framesReceived: number;
  framesDropped: number;
  utterancesDetected: number;
  utterancesDiscarded: number;
  turnsStarted: number;
  turnsCompleted: number;
  turnsFailed: number;
  bargeIns: number;
  chunksQueued: number;
  staleResultsDropped: number;
}

export interface SessionRegistryStats {
  activeSessions: number;
  byState: Record<CallState, number>;
}

export { DuplicateSessionError, UnknownSessionError } from './error.types';
