/**
 * In-process stand-in for platforms whose clients are not built in.
 * Used by the tests and by `fanpost post --dry-run`.
 */

import { SocialPlatformError, type PostErrorType } from '../errors/types.js';
import type { Account } from '../models/account.js';
import type { PlatformId } from '../models/platform.js';
import type { PostData } from '../models/post-data.js';
import type { PostResult } from '../models/post-result.js';
import { SocialPlatformService, type PlatformServiceDeps } from './interface.js';

export interface MockPlatformOptions extends PlatformServiceDeps {
  platform: PlatformId;
  /** Simulated latency per call. Default: 0 */
  delayMs?: number;
  /** Default: true */
  shouldSucceed?: boolean;
  /** Accounts that fail even when `shouldSucceed` is true. */
  failingAccountIds?: readonly string[];
  errorType?: PostErrorType;
  errorMessage?: string;
  /** Throw a SocialPlatformError instead of returning a failed result. */
  throwOnFailure?: boolean;
  requiredCredentialFields?: readonly string[];
  mediaSupport?: boolean;
  /** Only read when `mediaSupport` is set. Default: 4 */
  maxMediaAttachments?: number;
}

export interface MockPublishCall {
  content: string;
  accountId: string;
  mediaCount: number;
}

export class MockPlatformService extends SocialPlatformService {
  readonly platform: PlatformId;
  /** Every publish attempt, in call order. */
  readonly calls: MockPublishCall[] = [];

  private readonly options: MockPlatformOptions;

  constructor(options: MockPlatformOptions) {
    super(options);
    this.platform = options.platform;
    this.options = options;
  }

  override get requiredCredentialFields(): readonly string[] {
    return this.options.requiredCredentialFields ?? [];
  }

  override get supportsMediaUploads(): boolean {
    return this.options.mediaSupport ?? false;
  }

  override get maxMediaAttachments(): number {
    return this.supportsMediaUploads ? (this.options.maxMediaAttachments ?? 4) : 0;
  }

  async authenticate(account: Account): Promise<boolean> {
    await this.delay();
    if (!this.succeedsFor(account)) throw this.failure();
    return true;
  }

  async validateConnection(account: Account): Promise<boolean> {
    await this.delay();
    return this.succeedsFor(account);
  }

  async publishPost(content: string, account: Account): Promise<PostResult> {
    return this.record(content, account, 0);
  }

  override async publishPostWithMedia(post: PostData, account: Account): Promise<PostResult> {
    if (!this.supportsMediaUploads) return super.publishPostWithMedia(post, account);
    return this.record(post.content, account, post.media.length);
  }

  private async record(content: string, account: Account, mediaCount: number): Promise<PostResult> {
    this.calls.push({ content, accountId: account.id, mediaCount });
    await this.delay();

    if (this.succeedsFor(account)) return this.createSuccessResult(content, account);

    const error = this.failure();
    if (this.options.throwOnFailure) throw error;
    return this.createFailureResult(content, error.message, error.errorType, account);
  }

  private succeedsFor(account: Account): boolean {
    if (this.options.shouldSucceed === false) return false;
    return !(this.options.failingAccountIds ?? []).includes(account.id);
  }

  private failure(): SocialPlatformError {
    return new SocialPlatformError(
      this.platform,
      this.options.errorType ?? 'unknownError',
      this.options.errorMessage ?? 'Test error',
    );
  }

  private delay(): Promise<void> {
    const ms = this.options.delayMs ?? 0;
    return ms > 0 ? new Promise((resolve) => setTimeout(resolve, ms)) : Promise.resolve();
  }
}
