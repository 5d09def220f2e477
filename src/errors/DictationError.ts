import { errors as undiciErrors } from 'undici';
import type { FailureKind } from '../types/index.js';

const BODY_EXCERPT_LENGTH = 300;

export class DictationError extends Error {
  constructor(
    readonly kind: FailureKind,
    message: string,
    readonly statusCode?: number,
    readonly body?: string
  ) {
    super(message);
    this.name = 'DictationError';
  }

  /**
   * Map a non-2xx provider response to the failure taxonomy.
   */
  static fromStatus(provider: string, statusCode: number, body: string): DictationError {
    const excerpt = body.slice(0, BODY_EXCERPT_LENGTH).trim();
    const detail = excerpt ? `: ${excerpt}` : '';

    switch (statusCode) {
      case 401:
      case 403:
        return new DictationError('auth-failure', `${provider} rejected the API key (${statusCode})${detail}`, statusCode, excerpt);
      case 413:
        return new DictationError('payload-too-large', `${provider} refused the audio as too large (413)`, statusCode, excerpt);
      case 429:
        return new DictationError('rate-limited', `${provider} rate limit reached (429)${detail}`, statusCode, excerpt);
      default:
        if (statusCode === 400 && /API_KEY_INVALID|API key not valid/i.test(body)) {
          return new DictationError('auth-failure', `${provider} rejected the API key (400)`, statusCode, excerpt);
        }
        return new DictationError('server-error', `${provider} request failed (${statusCode})${detail}`, statusCode, excerpt);
    }
  }

  /**
   * Map an exception raised while sending or reading a request. Anything that
   * is not already a DictationError counts as a network failure.
   */
  static fromTransportError(provider: string, error: unknown): DictationError {
    if (error instanceof DictationError) {
      return error;
    }
    if (isTimeout(error)) {
      return new DictationError('network-timeout', `${provider} request timed out`);
    }
    const reason = error instanceof Error ? error.message : String(error);
    return new DictationError('network-timeout', `${provider} request failed: ${reason}`);
  }
}

export function isDictationError(error: unknown): error is DictationError {
  return error instanceof DictationError;
}

function isTimeout(error: unknown): boolean {
  if (
    error instanceof undiciErrors.ConnectTimeoutError ||
    error instanceof undiciErrors.HeadersTimeoutError ||
    error instanceof undiciErrors.BodyTimeoutError
  ) {
    return true;
  }
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}
