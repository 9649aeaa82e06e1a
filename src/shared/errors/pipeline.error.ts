/**
 * Pipeline Error Base
 * Every error the call pipeline raises on purpose extends this class.
 */

export abstract class PipelineError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Failure of an external engine (transcription, generation, synthesis)
 */
export abstract class ExternalDependencyError extends PipelineError {
  /** Whether retrying the same request may succeed */
  readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown; retryable?: boolean }) {
    super(message, { cause: options?.cause });
    this.retryable = options?.retryable ?? false;
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
