/**
 * Contract every platform service implements.
 *
 * Services report publish failures as failed {@link PostResult}s rather than
 * throwing. The retry wrappers turn retryable failures back into errors so
 * the retry loop can see them, and hand back the last result once it gives up.
 */

import { classifyError, errorMessage } from '../errors/classify.js';
import { SocialPlatformError, type PostErrorType } from '../errors/types.js';
import type { Account } from '../models/account.js';
import { PLATFORMS, type PlatformId } from '../models/platform.js';
import type { PostData } from '../models/post-data.js';
import { PostResult, targetKey } from '../models/post-result.js';
import { RetryManager, type RetryOptions } from '../retry/retry-manager.js';

export interface PlatformServiceDeps {
  retryManager?: RetryManager;
}

export interface PublishRetryOptions {
  isCancelled?: () => boolean;
  /** Overrides the service's own retry manager for this call. */
  retryManager?: RetryManager;
}

/** Thrown inside the retry loop so a failed result can be retried. */
class FailedResultError extends SocialPlatformError {
  readonly result: PostResult;

  constructor(platform: PlatformId, errorType: PostErrorType, message: string, result: PostResult) {
    super(platform, errorType, message);
    this.name = 'FailedResultError';
    this.result = result;
  }
}

export abstract class SocialPlatformService {
  abstract readonly platform: PlatformId;

  protected readonly retryManager: RetryManager;

  constructor(deps: PlatformServiceDeps = {}) {
    this.retryManager = deps.retryManager ?? new RetryManager();
  }

  get platformName(): string {
    return PLATFORMS[this.platform].displayName;
  }

  get characterLimit(): number {
    return PLATFORMS[this.platform].characterLimit;
  }

  get requiredCredentialFields(): readonly string[] {
    return [];
  }

  // ---- Operations ----

  /** Check the account can act on the platform. Throws SocialPlatformError on failure. */
  abstract authenticate(account: Account): Promise<boolean>;

  abstract publishPost(content: string, account: Account): Promise<PostResult>;

  abstract validateConnection(account: Account): Promise<boolean>;

  // ---- Media ----

  get supportsMediaUploads(): boolean {
    return false;
  }

  get maxMediaAttachments(): number {
    return 0;
  }

  /** Services without media support post the text alone. */
  publishPostWithMedia(post: PostData, account: Account): Promise<PostResult> {
    return this.publishPost(post.content, account);
  }

  // ---- Content ----

  isContentValid(content: string): boolean {
    return content.length <= this.characterLimit;
  }

  getRemainingCharacters(content: string): number {
    return this.characterLimit - content.length;
  }

  // ---- Credentials ----

  validateCredentials(account: Account): boolean {
    return account.platform === this.platform;
  }

  hasRequiredCredentials(account: Account): boolean {
    if (!this.validateCredentials(account)) return false;
    return this.requiredCredentialFields.every((field) => account.hasCredential(field));
  }

  // ---- Results ----

  createSuccessResult(content: string, account?: Account): PostResult {
    return new PostResult(content).addPlatformResult(this.platform, true, { accountId: account?.id });
  }

  createFailureResult(content: string, message: string, errorType: PostErrorType, account?: Account): PostResult {
    return new PostResult(content).addPlatformResult(this.platform, false, {
      accountId: account?.id,
      error: message,
      errorType,
    });
  }

  handleError(content: string, error: unknown, account?: Account): PostResult {
    return this.createFailureResult(content, errorMessage(error), classifyError(error), account);
  }

  // ---- Retry wrappers ----

  authenticateWithRetry(account: Account, options: PublishRetryOptions = {}): Promise<boolean> {
    const retry = options.retryManager ?? this.retryManager;
    return retry.executeAuth(this.platformName, () => this.authenticate(account), this.retryOptions(options));
  }

  validateConnectionWithRetry(account: Account, options: PublishRetryOptions = {}): Promise<boolean> {
    const retry = options.retryManager ?? this.retryManager;
    return retry.executeValidation(this.platformName, () => this.validateConnection(account), this.retryOptions(options));
  }

  publishPostWithRetry(content: string, account: Account, options: PublishRetryOptions = {}): Promise<PostResult> {
    return this.retryPublish(() => this.publishPost(content, account), account, options);
  }

  publishPostWithMediaRetry(post: PostData, account: Account, options: PublishRetryOptions = {}): Promise<PostResult> {
    return this.retryPublish(() => this.publishPostWithMedia(post, account), account, options);
  }

  private async retryPublish(
    publish: () => Promise<PostResult>,
    account: Account,
    options: PublishRetryOptions,
  ): Promise<PostResult> {
    const retry = options.retryManager ?? this.retryManager;
    const key = targetKey(this.platform, account.id);
    try {
      return await retry.executePost(
        this.platformName,
        async () => {
          const result = await publish();
          const errorType = result.getErrorType(key);
          if (!result.isSuccessful(key) && errorType) {
            throw new FailedResultError(this.platform, errorType, result.getError(key) ?? 'Unknown error', result);
          }
          return result;
        },
        this.retryOptions(options),
      );
    } catch (err) {
      if (err instanceof FailedResultError) return err.result;
      throw err;
    }
  }

  private retryOptions(options: PublishRetryOptions): RetryOptions {
    return { platform: this.platform, isCancelled: options.isCancelled };
  }
}
