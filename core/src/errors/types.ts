/**
 * Typed error variants raised across fanpost.
 *
 * Failures are tagged where they are thrown; {@link classifyError} only falls
 * back to reading error text for errors that come from third-party code.
 */

import type { PlatformId } from '../models/platform.js';

/** Machine-checkable failure kinds carried by post results. */
export type PostErrorType =
  | 'networkError'
  | 'authenticationError'
  | 'rateLimitError'
  | 'contentTooLong'
  | 'platformUnavailable'
  | 'invalidCredentials'
  | 'serverError'
  | 'unknownError';

export const POST_ERROR_TYPES: readonly PostErrorType[] = [
  'networkError',
  'authenticationError',
  'rateLimitError',
  'contentTooLong',
  'platformUnavailable',
  'invalidCredentials',
  'serverError',
  'unknownError',
];

export function isPostErrorType(value: unknown): value is PostErrorType {
  return typeof value === 'string' && POST_ERROR_TYPES.some((type) => type === value);
}

/** Failure reported by a platform service. */
export class SocialPlatformError extends Error {
  readonly platform: PlatformId;
  readonly errorType: PostErrorType;

  constructor(platform: PlatformId, errorType: PostErrorType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SocialPlatformError';
    this.platform = platform;
    this.errorType = errorType;
  }
}

/** Malformed hex or bech32 key material. */
export class KeyFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KeyFormatError';
  }
}

/** Secret scalar outside [1, n-1]. */
export class KeyRangeError extends Error {
  constructor(message = 'Secret key is outside the valid range [1, n-1]') {
    super(message);
    this.name = 'KeyRangeError';
  }
}

export type RelayErrorCode =
  | 'invalid-url'
  | 'connect-failed'
  | 'connect-timeout'
  | 'ack-timeout'
  | 'closed'
  | 'rejected';

/** A single relay operation failed. `reason` holds the relay's OK message, if any. */
export class RelayError extends Error {
  readonly code: RelayErrorCode;
  readonly relayUrl: string;
  readonly reason?: string;

  constructor(code: RelayErrorCode, relayUrl: string, message: string, reason?: string) {
    super(message);
    this.name = 'RelayError';
    this.code = code;
    this.relayUrl = relayUrl;
    this.reason = reason;
  }

  /** NIP-01 machine-readable prefix of a rejection reason ("rate-limited", "blocked", ...). */
  get reasonPrefix(): string | null {
    if (!this.reason) return null;
    const idx = this.reason.indexOf(':');
    return idx > 0 ? this.reason.slice(0, idx) : null;
  }
}

export type PostOrchestratorErrorCode =
  | 'busy'
  | 'empty-content'
  | 'no-platforms'
  | 'content-too-long'
  | 'too-many-media'
  | 'media-unsupported'
  | 'missing-account'
  | 'platform-mismatch'
  | 'inactive-account';

/** The orchestrator refused to start a posting run. */
export class PostOrchestratorError extends Error {
  readonly code: PostOrchestratorErrorCode;

  constructor(code: PostOrchestratorErrorCode, message: string) {
    super(message);
    this.name = 'PostOrchestratorError';
    this.code = code;
  }
}

export class AccountManagerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AccountManagerError';
  }
}

/** Raised by the retry loop when the caller cancelled before the next attempt. */
export class CancelledError extends Error {
  constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
