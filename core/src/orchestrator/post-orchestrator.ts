/**
 * Multi-platform, multi-account posting.
 *
 * A run validates the whole selection up front, then publishes to every
 * {platform, account} pair concurrently. Each pair owns its own slice of the
 * result; the slices are merged once every task has settled.
 */

import { EventEmitter } from 'node:events';

import { errorMessage } from '../errors/classify.js';
import type { ErrorHandler } from '../errors/error-handler.js';
import { PostOrchestratorError } from '../errors/types.js';
import type { Account } from '../models/account.js';
import { PLATFORMS, platformName, type PlatformId } from '../models/platform.js';
import { hasMedia, toPostData, type PostData } from '../models/post-data.js';
import { PostResult, targetKey } from '../models/post-result.js';
import { PostingProgress, targetStatus, type PostingTarget } from '../models/posting-progress.js';
import type { SocialPlatformService } from '../platforms/interface.js';
import { RetryManager } from '../retry/retry-manager.js';

export type AccountSelection = ReadonlyMap<PlatformId, readonly Account[]>;

export interface ContentValidation {
  valid: boolean;
  length: number;
  /** Smallest limit across the platforms; 0 when none are selected. */
  limit: number;
  /** Platforms whose limit the content exceeds. */
  exceeding: PlatformId[];
}

export interface PostOrchestratorDeps {
  retryManager?: RetryManager;
  errorHandler?: ErrorHandler;
}

/** Emits `progress` with a {@link PostingProgress} on every state change. */
export class PostOrchestrator extends EventEmitter {
  private readonly services: ReadonlyMap<PlatformId, SocialPlatformService>;
  private readonly retryManager: RetryManager;
  private readonly errorHandler?: ErrorHandler;

  private currentProgress = PostingProgress.idle();
  private latestResult: PostResult | null = null;
  private running = false;

  /** Incremented per run; tasks from an older run never touch state. */
  private runId = 0;
  private cancelled = false;
  private interrupt: (() => void) | null = null;

  constructor(services: ReadonlyMap<PlatformId, SocialPlatformService>, deps: PostOrchestratorDeps = {}) {
    super();
    this.services = services;
    this.retryManager = deps.retryManager ?? new RetryManager({ errorHandler: deps.errorHandler });
    this.errorHandler = deps.errorHandler;
  }

  get progress(): PostingProgress {
    return this.currentProgress;
  }

  get lastResult(): PostResult | null {
    return this.latestResult;
  }

  get isPosting(): boolean {
    return this.running;
  }

  getService(platform: PlatformId): SocialPlatformService | undefined {
    return this.services.get(platform);
  }

  // ---- Content helpers ----

  getCharacterLimit(platforms: Iterable<PlatformId>): number {
    let limit = Infinity;
    for (const platform of platforms) {
      limit = Math.min(limit, this.limitFor(platform));
    }
    return limit === Infinity ? 0 : limit;
  }

  getRemainingCharacters(content: string, platforms: Iterable<PlatformId>): number {
    return this.getCharacterLimit(platforms) - content.length;
  }

  validateContentForPlatforms(content: string, platforms: Iterable<PlatformId>): ContentValidation {
    const selected = [...new Set(platforms)];
    const exceeding = selected.filter((platform) => content.length > this.limitFor(platform));
    return {
      valid: selected.length > 0 && exceeding.length === 0,
      length: content.length,
      limit: this.getCharacterLimit(selected),
      exceeding,
    };
  }

  /**
   * Smallest attachment limit among the selected platforms that take images;
   * 0 when none does. Platforms without media support post the text alone.
   */
  getMediaLimit(platforms: Iterable<PlatformId>): number {
    let limit = Infinity;
    for (const platform of platforms) {
      const service = this.services.get(platform);
      if (service?.supportsMediaUploads) limit = Math.min(limit, service.maxMediaAttachments);
    }
    return limit === Infinity ? 0 : limit;
  }

  canPost(content: string, platforms: Iterable<PlatformId>): boolean {
    if (this.running || content.trim().length === 0) return false;
    return this.validateContentForPlatforms(content, platforms).valid;
  }

  // ---- Posting ----

  /**
   * Publish to every selected account of every selected platform.
   *
   * @throws PostOrchestratorError when a run is already in progress or the
   *   selection is invalid; no network call is made in either case.
   */
  async publishToSelectedPlatforms(
    post: string | PostData,
    platforms: Iterable<PlatformId>,
    accountsByPlatform: AccountSelection,
  ): Promise<PostResult> {
    if (this.running) {
      throw new PostOrchestratorError('busy', 'A post is already in progress');
    }

    const data = toPostData(post);
    const selected = [...new Set(platforms)];
    const targets = this.collectTargets(selected, accountsByPlatform);
    const startTime = new Date();
    const runId = ++this.runId;

    this.running = true;
    this.cancelled = false;
    const interrupted = new Promise<'cancelled'>((resolve) => {
      this.interrupt = () => resolve('cancelled');
    });

    try {
      this.setProgress(PostingProgress.preparing(targets, startTime));

      try {
        this.validateSelection(data, selected, accountsByPlatform);
      } catch (err) {
        const message = errorMessage(err);
        const failed = PostResult.allFailed(data.content, targets, message);
        this.latestResult = failed;
        this.setProgress(PostingProgress.failed(targets, message, startTime, failed));
        throw err;
      }

      let settled: PostResult[] | 'cancelled' = 'cancelled';
      if (!this.cancelled) {
        this.setProgress(PostingProgress.posting(targets, startTime));
        const tasks = Promise.all(
          targets.map(({ platform, account }) => this.postToTarget(runId, platform, account, data)),
        );
        settled = await Promise.race([tasks, interrupted]);
      }

      if (settled === 'cancelled') {
        const result = PostResult.allFailed(data.content, targets, 'Posting cancelled');
        this.latestResult = result;
        this.setProgress(PostingProgress.cancelled(targets, startTime, result));
        console.warn('[fanpost] Posting cancelled');
        return result;
      }

      let merged = new PostResult(data.content, { timestamp: startTime });
      for (const result of settled) merged = merged.merge(result);

      this.latestResult = merged;
      this.setProgress(PostingProgress.completed(merged, startTime));
      console.log(`[fanpost] ${merged.getSummaryMessage()}`);
      return merged;
    } finally {
      this.running = false;
      this.interrupt = null;
    }
  }

  /**
   * Stop waiting for the current run. In-flight requests are not aborted;
   * their results are discarded when they arrive.
   *
   * @returns false when nothing was running
   */
  cancel(): boolean {
    if (!this.running || this.cancelled) return false;
    this.cancelled = true;
    this.interrupt?.();
    return true;
  }

  // ---- Internals ----

  private limitFor(platform: PlatformId): number {
    return this.services.get(platform)?.characterLimit ?? PLATFORMS[platform].characterLimit;
  }

  private collectTargets(
    platforms: readonly PlatformId[],
    accountsByPlatform: AccountSelection,
  ): Array<PostingTarget & { account?: Account }> {
    const targets: Array<PostingTarget & { account?: Account }> = [];
    for (const platform of platforms) {
      const accounts = accountsByPlatform.get(platform) ?? [];
      if (accounts.length === 0) {
        targets.push({ platform });
        continue;
      }
      for (const account of accounts) targets.push({ platform, accountId: account.id, account });
    }
    return targets;
  }

  private validateSelection(data: PostData, platforms: readonly PlatformId[], accountsByPlatform: AccountSelection): void {
    if (data.content.trim().length === 0 && !hasMedia(data)) {
      throw new PostOrchestratorError('empty-content', 'Post content cannot be empty');
    }
    if (platforms.length === 0) {
      throw new PostOrchestratorError('no-platforms', 'No platforms selected');
    }

    const limit = this.getCharacterLimit(platforms);
    if (data.content.length > limit) {
      throw new PostOrchestratorError(
        'content-too-long',
        `Content is ${data.content.length} characters; the selected platforms allow at most ${limit}`,
      );
    }

    if (hasMedia(data)) {
      const mediaLimit = this.getMediaLimit(platforms);
      if (mediaLimit === 0) {
        throw new PostOrchestratorError('media-unsupported', 'None of the selected platforms accepts images');
      }
      if (data.media.length > mediaLimit) {
        throw new PostOrchestratorError(
          'too-many-media',
          `${data.media.length} images attached; the selected platforms allow at most ${mediaLimit}`,
        );
      }
    }

    for (const platform of platforms) {
      const accounts = accountsByPlatform.get(platform) ?? [];
      if (accounts.length === 0) {
        throw new PostOrchestratorError('missing-account', `No account selected for ${platformName(platform)}`);
      }
      for (const account of accounts) {
        if (account.platform !== platform) {
          throw new PostOrchestratorError(
            'platform-mismatch',
            `Account ${account.username} belongs to ${platformName(account.platform)}, not ${platformName(platform)}`,
          );
        }
        if (!account.isActive) {
          throw new PostOrchestratorError(
            'inactive-account',
            `Account ${account.username} on ${platformName(platform)} is inactive`,
          );
        }
      }
    }
  }

  /** Never throws; every failure becomes a failed result for this target. */
  private async postToTarget(runId: number, platform: PlatformId, account: Account | undefined, data: PostData): Promise<PostResult> {
    const service = this.services.get(platform);
    const accountId = account?.id;

    if (!service || !account) {
      const result = new PostResult(data.content).addPlatformResult(platform, false, {
        accountId,
        error: `${platformName(platform)} is not available`,
        errorType: 'platformUnavailable',
      });
      this.updateTarget(runId, result, platform, accountId);
      return result;
    }

    if (!service.hasRequiredCredentials(account)) {
      const result = service.createFailureResult(
        data.content,
        'Account missing required credentials',
        'invalidCredentials',
        account,
      );
      this.updateTarget(runId, result, platform, accountId);
      return result;
    }

    this.markPosting(runId, platform, accountId);

    const options = {
      retryManager: this.retryManager,
      isCancelled: () => this.cancelled || runId !== this.runId,
    };

    let result: PostResult;
    try {
      result = hasMedia(data)
        ? await service.publishPostWithMediaRetry(data, account, options)
        : await service.publishPostWithRetry(data.content, account, options);
    } catch (err) {
      this.errorHandler?.logError(`Post to ${service.platformName}`, err, {
        platform,
        context: { accountId: account.id },
      });
      result = service.handleError(data.content, err, account);
    }

    this.updateTarget(runId, result, platform, accountId);
    return result;
  }

  private isCurrent(runId: number): boolean {
    return runId === this.runId && this.running && !this.cancelled;
  }

  private markPosting(runId: number, platform: PlatformId, accountId?: string): void {
    if (!this.isCurrent(runId)) return;
    this.setProgress(this.currentProgress.updateTargetStatus(targetStatus({ platform, accountId }, 'posting')));
  }

  private updateTarget(runId: number, result: PostResult, platform: PlatformId, accountId?: string): void {
    if (!this.isCurrent(runId)) return;
    const key = targetKey(platform, accountId);
    const status = result.isSuccessful(key)
      ? targetStatus({ platform, accountId }, 'completed')
      : targetStatus({ platform, accountId }, 'failed', {
          error: result.getError(key),
          errorType: result.getErrorType(key),
        });
    this.setProgress(this.currentProgress.updateTargetStatus(status));
  }

  private setProgress(progress: PostingProgress): void {
    this.currentProgress = progress;
    this.emit('progress', progress);
  }
}
