/**
 * Audio Error Types
 */

import { PipelineError } from '@/shared/errors';

/**
 * Inbound payload could not be decoded into a frame.
 * The frame is dropped; the session is unaffected.
 */
export class MalformedFrameError extends PipelineError {
  readonly code = 'MALFORMED_FRAME';
  readonly sequence: number;

  constructor(message: string, sequence: number, options?: { cause?: unknown }) {
    super(message, options);
    this.sequence = sequence;
  }
}
