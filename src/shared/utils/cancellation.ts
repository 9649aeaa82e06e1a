/**
 * Turn cancellation helpers
 *
 * Every adapter call carries a TurnToken. The token's signal is aborted when
 * the turn is interrupted (barge-in), fails, times out or the call ends.
 */

export interface TurnToken {
  readonly callId: string;
  readonly generationId: number;
  readonly signal: AbortSignal;
}

/**
 * Raised inside adapters when the requesting turn was cancelled
 */
export class TurnCancelledError extends Error {
  readonly generationId: number;

  constructor(token: Pick<TurnToken, 'generationId'>) {
    super(`Turn ${token.generationId} was cancelled`);
    this.name = 'TurnCancelledError';
    this.generationId = token.generationId;
  }
}

export function isTurnCancelled(error: unknown): boolean {
  if (error instanceof TurnCancelledError) {
    return true;
  }
  return error instanceof Error && error.name === 'AbortError';
}

export function throwIfCancelled(token: TurnToken): void {
  if (token.signal.aborted) {
    throw new TurnCancelledError(token);
  }
}

/**
 * Settle with the promise or reject as soon as the token is aborted.
 * The underlying work is abandoned, not awaited.
 */
export function raceWithAbort<T>(promise: Promise<T>, token: TurnToken): Promise<T> {
  if (token.signal.aborted) {
    // Keep the abandoned promise from surfacing as an unhandled rejection
    promise.catch(() => undefined);
    return Promise.reject(new TurnCancelledError(token));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new TurnCancelledError(token));
    };
    token.signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        token.signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        token.signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Sleep that wakes early (with TurnCancelledError) when the token aborts
 */
export function abortableDelay(ms: number, token: TurnToken): Promise<void> {
  if (token.signal.aborted) {
    return Promise.reject(new TurnCancelledError(token));
  }
  return raceWithAbort(
    new Promise<void>((resolve) => {
      const timer = setTimeout(resolve, ms);
      token.signal.addEventListener('abort', () => clearTimeout(timer), { once: true });
    }),
    token
  );
}
