/**
 * HTTP status extraction for provider SDK errors
 */

function readNumber(source: object, key: string): number | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'number' ? value : undefined;
}

/**
 * Extract an HTTP status code from an SDK error object or its message
 * (e.g. "HTTP 401: Unauthorized")
 */
export function extractStatusCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }

  const status = readNumber(error, 'status') ?? readNumber(error, 'statusCode');
  if (status !== undefined) {
    return status;
  }

  const message: unknown = Reflect.get(error, 'message');
  if (typeof message === 'string') {
    const statusMatch = message.match(/(?:HTTP\s)?\b([45]\d{2})(?:\s|:)/i);
    if (statusMatch) {
      return parseInt(statusMatch[1], 10);
    }
  }

  return undefined;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
