/**
 * HTTP Status Extraction Tests
 */

import { describe, it, expect } from 'vitest';
import { errorMessage, extractStatusCode } from '@/shared/errors';

describe('extractStatusCode', () => {
  it('should read status properties', () => {
    expect(extractStatusCode({ status: 429 })).toBe(429);
    expect(extractStatusCode({ statusCode: 503 })).toBe(503);
  });

  it('should parse the status from the message', () => {
    expect(extractStatusCode(new Error('HTTP 401: Unauthorized'))).toBe(401);
    expect(extractStatusCode(new Error('Request failed 502 Bad Gateway'))).toBe(502);
  });

  it('should return undefined when nothing matches', () => {
    expect(extractStatusCode(new Error('socket hang up'))).toBeUndefined();
    expect(extractStatusCode('500')).toBeUndefined();
    expect(extractStatusCode(null)).toBeUndefined();
  });
});

describe('errorMessage', () => {
  it('should prefer the error message', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(404)).toBe('404');
  });
});
