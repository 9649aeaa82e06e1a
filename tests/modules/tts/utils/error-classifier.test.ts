/**
 * Synthesis Error Classifier Tests
 */

import { describe, it, expect } from 'vitest';
import { classifySynthesisError, isFatalError, TTSErrorType } from '@/modules/tts';
import { httpError } from '../../../helpers/tokens';

describe('classifySynthesisError', () => {
  it('should classify by status code', () => {
    expect(classifySynthesisError(httpError(403, 'Forbidden')).type).toBe(TTSErrorType.AUTH);
    expect(classifySynthesisError(httpError(429, 'Slow down')).type).toBe(TTSErrorType.RATE_LIMIT);
    expect(classifySynthesisError(httpError(400, 'Bad voice'))).toMatchObject({
      type: TTSErrorType.FATAL,
      message: 'Client error: Bad voice',
      retryable: false,
    });
    expect(classifySynthesisError(httpError(502, 'Bad gateway')).type).toBe(TTSErrorType.TRANSIENT);
  });

  it('should classify by message', () => {
    expect(classifySynthesisError(new Error('Request timed out')).type).toBe(TTSErrorType.TIMEOUT);
    expect(classifySynthesisError(new Error('getaddrinfo ENOTFOUND api')).type).toBe(
      TTSErrorType.CONNECTION
    );
    expect(classifySynthesisError(null)).toMatchObject({
      type: TTSErrorType.TRANSIENT,
      message: 'Unknown error',
    });
  });

  it('should flag auth and client errors as fatal', () => {
    expect(isFatalError(classifySynthesisError(httpError(401, 'no')))).toBe(true);
    expect(isFatalError(classifySynthesisError(httpError(404, 'no')))).toBe(true);
    expect(isFatalError(classifySynthesisError(new Error('flaky')))).toBe(false);
  });
});
