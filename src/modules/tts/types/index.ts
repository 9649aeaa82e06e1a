/**
 * TTS Types
 */

import type { TurnToken } from '@/shared/utils';

/**
 * Converts reply text into PCM16 mono audio at `sampleRate`.
 * Accepts arbitrary text boundaries (a whole reply or a fragment).
 * Rejects (or throws while iterating) with SynthesisError.
 */
export interface SynthesisAdapter {
  readonly sampleRate: number;
  synthesize(text: string, token: TurnToken): Promise<Buffer | AsyncIterable<Buffer>>;
}

export { SynthesisError, TTSErrorType } from './error.types';
export type { ClassifiedError } from './error.types';
