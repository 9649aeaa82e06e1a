/**
 * Call Error Types
 * Integration errors surfaced to the transport layer
 */

import { PipelineError } from '@/shared/errors';

export class DuplicateSessionError extends PipelineError {
  readonly code = 'DUPLICATE_SESSION';
  readonly callId: string;

  constructor(callId: string) {
    super(`A session already exists for call ${callId}`);
    this.callId = callId;
  }
}

export class UnknownSessionError extends PipelineError {
  readonly code = 'UNKNOWN_SESSION';
  readonly callId: string;

  constructor(callId: string) {
    super(`No session exists for call ${callId}`);
    this.callId = callId;
  }
}
