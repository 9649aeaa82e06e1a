/**
 * Cancellation Helper Tests
 */

import { describe, it, expect } from 'vitest';
import {
  TurnCancelledError,
  abortableDelay,
  isTurnCancelled,
  raceWithAbort,
  throwIfCancelled,
} from '@/shared/utils/cancellation';
import type { TurnToken } from '@/shared/utils/cancellation';

function makeToken(controller = new AbortController()): TurnToken {
  return { callId: 'call-1', generationId: 4, signal: controller.signal };
}

describe('cancellation helpers', () => {
  it('should recognise cancellation errors', () => {
    const abortError = new Error('aborted');
    abortError.name = 'AbortError';

    expect(isTurnCancelled(new TurnCancelledError({ generationId: 1 }))).toBe(true);
    expect(isTurnCancelled(abortError)).toBe(true);
    expect(isTurnCancelled(new Error('boom'))).toBe(false);
    expect(isTurnCancelled('AbortError')).toBe(false);
  });

  it('should throw only once the token is aborted', () => {
    const controller = new AbortController();
    const token = makeToken(controller);

    expect(() => throwIfCancelled(token)).not.toThrow();
    controller.abort();
    expect(() => throwIfCancelled(token)).toThrow(TurnCancelledError);
  });

  it('should carry the generation id', () => {
    const controller = new AbortController();
    controller.abort();

    try {
      throwIfCancelled(makeToken(controller));
      expect.fail('expected cancellation');
    } catch (error) {
      expect(error).toBeInstanceOf(TurnCancelledError);
      expect(error instanceof TurnCancelledError && error.generationId).toBe(4);
    }
  });

  describe('raceWithAbort', () => {
    it('should resolve with the value when not aborted', async () => {
      await expect(raceWithAbort(Promise.resolve('done'), makeToken())).resolves.toBe('done');
    });

    it('should pass through rejections', async () => {
      await expect(raceWithAbort(Promise.reject(new Error('boom')), makeToken())).rejects.toThrow(
        'boom'
      );
    });

    it('should reject as soon as the token aborts', async () => {
      const controller = new AbortController();
      const pending = raceWithAbort(new Promise<string>(() => undefined), makeToken(controller));

      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(TurnCancelledError);
    });

    it('should reject immediately for an already aborted token', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        raceWithAbort(Promise.reject(new Error('ignored')), makeToken(controller))
      ).rejects.toBeInstanceOf(TurnCancelledError);
    });
  });

  it('should end an abortable delay early', async () => {
    const controller = new AbortController();
    const delay = abortableDelay(60_000, makeToken(controller));

    controller.abort();

    await expect(delay).rejects.toBeInstanceOf(TurnCancelledError);
  });
});
