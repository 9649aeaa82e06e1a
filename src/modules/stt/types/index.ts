/**
 * STT Types
 */

import type { Utterance } from '@/modules/audio';
import type { TurnToken } from '@/shared/utils';

/**
 * Converts a closed utterance into text.
 * Rejects with TranscriptionError; an empty string means nothing intelligible was said.
 */
export interface TranscriptionAdapter {
  transcribe(utterance: Utterance, token: TurnToken): Promise<string>;
}

export { TranscriptionError } from './error.types';
