/**
 * Map arbitrary failures onto a {@link PostErrorType}.
 */

import {
  KeyFormatError,
  KeyRangeError,
  RelayError,
  SocialPlatformError,
  type PostErrorType,
} from './types.js';

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  const code = error.code;
  return typeof code === 'string' ? code : undefined;
}

/** Socket-level failures, timeouts and relay transport errors. */
export function isNetworkError(error: unknown): boolean {
  if (error instanceof RelayError) return error.code !== 'rejected';
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return true;
  }
  const code = errorCode(error);
  return code !== undefined && NETWORK_ERROR_CODES.has(code);
}

/** Classify a relay's rejection by its NIP-01 reason prefix. */
export function classifyRelayRejection(error: RelayError): PostErrorType {
  switch (error.reasonPrefix) {
    case 'rate-limited':
      return 'rateLimitError';
    case 'auth-required':
    case 'restricted':
      return 'authenticationError';
    case 'invalid':
    case 'pow':
    case 'blocked':
      return 'unknownError';
    default:
      return 'serverError';
  }
}

/** Last-resort classification of opaque errors by their message text. */
export function classifyByMessage(message: string): PostErrorType | null {
  const text = message.toLowerCase();
  if (text.includes('network') || text.includes('connection')) return 'networkError';
  if (text.includes('auth') || text.includes('unauthorized')) return 'authenticationError';
  if (text.includes('rate limit') || text.includes('too many requests')) return 'rateLimitError';
  if (text.includes('server') || text.includes('500')) return 'serverError';
  return null;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function classifyError(error: unknown, fallback: PostErrorType = 'unknownError'): PostErrorType {
  if (error instanceof SocialPlatformError) return error.errorType;
  if (error instanceof KeyFormatError || error instanceof KeyRangeError) return 'invalidCredentials';
  if (error instanceof RelayError && error.code === 'rejected') return classifyRelayRejection(error);
  if (isNetworkError(error)) return 'networkError';

  return classifyByMessage(errorMessage(error)) ?? fallback;
}
