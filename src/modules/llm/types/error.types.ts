/**
 * LLM Error Types
 */

import { ExternalDependencyError } from '@/shared/errors';

/**
 * The response generator failed or returned nothing usable
 */
export class GenerationError extends ExternalDependencyError {
  readonly code = 'GENERATION_FAILED';
}
