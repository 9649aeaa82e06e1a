/**
 * STT Error Types
 */

import { ExternalDependencyError } from '@/shared/errors';

/**
 * The transcription engine failed for an utterance
 */
export class TranscriptionError extends ExternalDependencyError {
  readonly code = 'TRANSCRIPTION_FAILED';
}
