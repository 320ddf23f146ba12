/**
 * Error log and user-facing messages.
 *
 * Entries are scrubbed before they are stored or printed: credential-looking
 * keys are redacted from context and secrets are masked inside messages.
 */

import { PLATFORMS, type PlatformId } from '../models/platform.js';
import { errorMessage } from './classify.js';
import { SocialPlatformError } from './types.js';

export interface ErrorLogEntry {
  timestamp: Date;
  operation: string;
  error: string;
  stack?: string;
  context?: Record<string, unknown>;
  platform?: PlatformId;
}

export interface LogErrorOptions {
  context?: Record<string, unknown>;
  platform?: PlatformId;
}

const SENSITIVE_KEYS = ['password', 'token', 'key', 'secret', 'auth', 'credential', 'jwt', 'bearer', 'private'];

const SENSITIVE_PATTERNS: Array<[RegExp, string]> = [
  [/eyJ[A-Za-z0-9_=-]+\.[A-Za-z0-9_=-]+\.?[A-Za-z0-9_.+/=-]*/g, '[JWT_TOKEN]'],
  [/Bearer\s+[A-Za-z0-9_=-]+/gi, 'Bearer [TOKEN]'],
  [/nsec1[02-9ac-hj-np-z]{20,}/g, '[PRIVATE_KEY]'],
  [/\b[a-fA-F0-9]{64}\b/g, '[PRIVATE_KEY]'],
  [/(https?|wss?):\/\/[^:/\s]+:[^@/\s]+@/g, '$1://[CREDENTIALS]@'],
  [/[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, '[EMAIL]'],
];

export function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitive) => lower.includes(sensitive));
}

export function maskSecrets(input: string): string {
  return SENSITIVE_PATTERNS.reduce((text, [pattern, replacement]) => text.replace(pattern, replacement), input);
}

export function sanitizeContext(context: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    if (isSensitiveKey(key)) {
      sanitized[key] = '[REDACTED]';
    } else if (typeof value === 'string') {
      sanitized[key] = maskSecrets(value);
    } else if (Array.isArray(value)) {
      sanitized[key] = value.map((item) => (typeof item === 'string' ? maskSecrets(item) : item));
    } else if (typeof value === 'object' && value !== null && !(value instanceof Date)) {
      sanitized[key] = sanitizeContext({ ...value });
    } else {
      sanitized[key] = value;
    }
  }
  return sanitized;
}

export class ErrorHandler {
  private entries: ErrorLogEntry[] = [];
  private readonly maxEntries: number;
  private readonly quiet: boolean;

  /**
   * @param options.maxEntries - Oldest entries are dropped beyond this. Default: 1000.
   * @param options.quiet - Keep entries without printing them.
   */
  constructor(options: { maxEntries?: number; quiet?: boolean } = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
    this.quiet = options.quiet ?? false;
  }

  logError(operation: string, error: unknown, options: LogErrorOptions = {}): ErrorLogEntry {
    const entry: ErrorLogEntry = {
      timestamp: new Date(),
      operation,
      error: maskSecrets(errorMessage(error)),
      stack: error instanceof Error && error.stack ? maskSecrets(error.stack) : undefined,
      context: options.context ? sanitizeContext(options.context) : undefined,
      platform: options.platform,
    };

    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }

    if (!this.quiet) {
      const where = entry.platform ? ` (${PLATFORMS[entry.platform].displayName})` : '';
      console.error(`[fanpost] ${operation}${where}: ${entry.error}`, entry.context ?? '');
    }
    return entry;
  }

  getRecentErrors(limit = 50): ErrorLogEntry[] {
    return this.entries.slice(-limit);
  }

  clearLogs(): void {
    this.entries = [];
  }

  getUserFriendlyMessage(error: unknown): string {
    if (error instanceof SocialPlatformError) {
      const { displayName, characterLimit } = PLATFORMS[error.platform];
      switch (error.errorType) {
        case 'networkError':
          return `Unable to connect to ${displayName}. Please check your internet connection.`;
        case 'authenticationError':
          return `Authentication failed for ${displayName}. Please check your account credentials.`;
        case 'rateLimitError':
          return `${displayName} rate limit exceeded. Please wait a few minutes before posting again.`;
        case 'contentTooLong':
          return `Post is too long for ${displayName}. Maximum ${characterLimit} characters allowed.`;
        case 'platformUnavailable':
          return `${displayName} is currently unavailable. Please try again later.`;
        case 'invalidCredentials':
          return `Invalid credentials for ${displayName}. Please update your account settings.`;
        case 'serverError':
          return `${displayName} server error. Please try again later.`;
        case 'unknownError':
          return `An error occurred while posting to ${displayName}. Please try again.`;
      }
    }

    if (error instanceof Error) {
      if (error.name === 'TimeoutError' || error.name === 'AbortError') {
        return 'Request timed out. Please check your connection and try again.';
      }
      if (error instanceof SyntaxError) {
        return 'Invalid data format received. Please try again.';
      }
    }

    return 'An unexpected error occurred. Please try again.';
  }
}
