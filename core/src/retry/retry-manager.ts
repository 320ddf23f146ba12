/**
 * Retry with exponential backoff and jitter.
 *
 * Attempt `a` (1-based) that fails waits
 * `min(initialDelayMs * backoffMultiplier^(a-1), maxDelayMs)` plus up to 25%
 * jitter before the next try. The last error is re-thrown as-is.
 */

import { classifyByMessage, classifyRelayRejection, errorMessage, isNetworkError } from '../errors/classify.js';
import type { ErrorHandler } from '../errors/error-handler.js';
import {
  CancelledError,
  KeyFormatError,
  KeyRangeError,
  RelayError,
  SocialPlatformError,
  type PostErrorType,
} from '../errors/types.js';
import type { PlatformId } from '../models/platform.js';

export interface RetryConfig {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffMultiplier: number;
  readonly retryOnNetworkError: boolean;
  readonly retryOnServerError: boolean;
  readonly retryOnRateLimit: boolean;
}

function preset(config: RetryConfig): RetryConfig {
  return Object.freeze({ ...config });
}

export const RetryConfig = Object.freeze({
  defaults: preset({
    maxAttempts: 3,
    initialDelayMs: 1000,
    maxDelayMs: 30_000,
    backoffMultiplier: 2,
    retryOnNetworkError: true,
    retryOnServerError: true,
    retryOnRateLimit: false,
  }),
  posting: preset({
    maxAttempts: 3,
    initialDelayMs: 2000,
    maxDelayMs: 15_000,
    backoffMultiplier: 2,
    retryOnNetworkError: true,
    retryOnServerError: true,
    retryOnRateLimit: false,
  }),
  authentication: preset({
    maxAttempts: 2,
    initialDelayMs: 1000,
    maxDelayMs: 5000,
    backoffMultiplier: 1.5,
    retryOnNetworkError: true,
    retryOnServerError: false,
    retryOnRateLimit: false,
  }),
  validation: preset({
    maxAttempts: 2,
    initialDelayMs: 500,
    maxDelayMs: 3000,
    backoffMultiplier: 2,
    retryOnNetworkError: true,
    retryOnServerError: false,
    retryOnRateLimit: false,
  }),
});

export interface RetryOptions {
  /** Replaces the config-based decision. Credential failures are never retried regardless. */
  shouldRetry?: (error: unknown) => boolean;
  platform?: PlatformId;
  /** Polled before every backoff sleep. */
  isCancelled?: () => boolean;
}

export interface RetryManagerDeps {
  sleep?: (ms: number) => Promise<void>;
  /** Jitter source in [0, 1). */
  random?: () => number;
  errorHandler?: ErrorHandler;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Failure kind as far as retrying is concerned; null when unknown. */
export function retryKind(error: unknown): PostErrorType | null {
  if (error instanceof SocialPlatformError) return error.errorType;
  if (error instanceof KeyFormatError || error instanceof KeyRangeError) return 'invalidCredentials';
  if (error instanceof RelayError && error.code === 'rejected') return classifyRelayRejection(error);
  if (isNetworkError(error)) return 'networkError';
  return null;
}

/** Untyped errors count too when their message reads like an auth failure. */
export function isCredentialFailure(error: unknown): boolean {
  const kind = retryKind(error) ?? classifyByMessage(errorMessage(error));
  return kind === 'authenticationError' || kind === 'invalidCredentials';
}

export function shouldRetryWithConfig(error: unknown, config: RetryConfig): boolean {
  switch (retryKind(error)) {
    case 'networkError':
      return config.retryOnNetworkError;
    case 'serverError':
      return config.retryOnServerError;
    case 'rateLimitError':
      return config.retryOnRateLimit;
    default:
      return false;
  }
}

export class RetryManager {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly errorHandler?: ErrorHandler;

  constructor(deps: RetryManagerDeps = {}) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.errorHandler = deps.errorHandler;
  }

  /** Backoff before the attempt following `attempt`, without jitter. */
  static baseDelay(attempt: number, config: RetryConfig): number {
    return Math.min(config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt - 1), config.maxDelayMs);
  }

  delayFor(attempt: number, config: RetryConfig): number {
    const base = RetryManager.baseDelay(attempt, config);
    return Math.round(base + base * 0.25 * this.random());
  }

  async executeWithRetry<T>(
    operationName: string,
    operation: () => Promise<T>,
    config: RetryConfig = RetryConfig.defaults,
    options: RetryOptions = {},
  ): Promise<T> {
    const maxAttempts = Math.max(1, config.maxAttempts);

    for (let attempt = 1; ; attempt++) {
      try {
        const result = await operation();
        if (attempt > 1) {
          console.log(`[retry] ${operationName} succeeded on attempt ${attempt}/${maxAttempts}`);
        }
        return result;
      } catch (err) {
        const retryable =
          !isCredentialFailure(err) &&
          (options.shouldRetry ? options.shouldRetry(err) : shouldRetryWithConfig(err, config));
        const willRetry = retryable && attempt < maxAttempts;

        this.errorHandler?.logError(`${operationName} - attempt ${attempt}`, err, {
          platform: options.platform,
          context: { attempt, maxAttempts, willRetry },
        });
        if (!willRetry) throw err;

        if (options.isCancelled?.()) throw new CancelledError();

        const delay = this.delayFor(attempt, config);
        console.warn(
          `[retry] ${operationName} failed (attempt ${attempt}/${maxAttempts}): ${errorMessage(err)}; retrying in ${delay}ms`,
        );
        await this.sleep(delay);
      }
    }
  }

  executePost<T>(platformName: string, operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
    return this.executeWithRetry(`Post to ${platformName}`, operation, RetryConfig.posting, options);
  }

  executeAuth<T>(platformName: string, operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
    return this.executeWithRetry(`Authenticate with ${platformName}`, operation, RetryConfig.authentication, options);
  }

  executeValidation<T>(platformName: string, operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
    return this.executeWithRetry(
      `Validate connection to ${platformName}`,
      operation,
      RetryConfig.validation,
      options,
    );
  }
}
