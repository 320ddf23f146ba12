/**
 * Snapshots of an in-flight posting run.
 *
 * idle -> preparing -> posting -> completed | cancelled | failed
 */

import type { PostErrorType } from '../errors/types.js';
import type { PlatformId } from './platform.js';
import { targetKey, type PostResult } from './post-result.js';

export type PostingState = 'idle' | 'preparing' | 'posting' | 'completed' | 'cancelled' | 'failed';

export type TargetPostingState = 'preparing' | 'posting' | 'completed' | 'failed' | 'cancelled';

export interface PostingTarget {
  platform: PlatformId;
  accountId?: string;
}

export interface PlatformPostingStatus {
  readonly platform: PlatformId;
  readonly accountId?: string;
  readonly state: TargetPostingState;
  readonly message?: string;
  readonly error?: string;
  readonly errorType?: PostErrorType;
  readonly timestamp: Date;
}

const STATUS_MESSAGES: Record<TargetPostingState, string> = {
  preparing: 'Preparing...',
  posting: 'Posting...',
  completed: 'Posted successfully',
  failed: 'Failed to post',
  cancelled: 'Cancelled',
};

export function targetStatus(
  target: PostingTarget,
  state: TargetPostingState,
  failure?: { error?: string; errorType?: PostErrorType },
): PlatformPostingStatus {
  return Object.freeze({
    platform: target.platform,
    accountId: target.accountId,
    state,
    message: STATUS_MESSAGES[state],
    error: failure?.error,
    errorType: failure?.errorType,
    timestamp: new Date(),
  });
}

interface ProgressInit {
  state: PostingState;
  statuses: ReadonlyMap<string, PlatformPostingStatus>;
  overallMessage?: string;
  overallProgress?: number;
  startTime?: Date;
  endTime?: Date;
  result?: PostResult;
  isCancellable?: boolean;
}

function statusesFor(targets: Iterable<PostingTarget>, state: TargetPostingState): Map<string, PlatformPostingStatus> {
  const statuses = new Map<string, PlatformPostingStatus>();
  for (const target of targets) {
    statuses.set(targetKey(target.platform, target.accountId), targetStatus(target, state));
  }
  return statuses;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

export class PostingProgress {
  readonly state: PostingState;
  /** Per-target status keyed by target key. */
  readonly statuses: ReadonlyMap<string, PlatformPostingStatus>;
  readonly overallMessage?: string;
  /** 0..1, undefined once the run was cancelled or failed. */
  readonly overallProgress?: number;
  readonly startTime?: Date;
  readonly endTime?: Date;
  readonly result?: PostResult;
  readonly isCancellable: boolean;

  private constructor(init: ProgressInit) {
    this.state = init.state;
    this.statuses = init.statuses;
    this.overallMessage = init.overallMessage;
    this.overallProgress = init.overallProgress;
    this.startTime = init.startTime;
    this.endTime = init.endTime;
    this.result = init.result;
    this.isCancellable = init.isCancellable ?? false;
    Object.freeze(this);
  }

  // ---- Factories ----

  static idle(): PostingProgress {
    return new PostingProgress({ state: 'idle', statuses: new Map() });
  }

  static preparing(targets: Iterable<PostingTarget>, startTime = new Date()): PostingProgress {
    return new PostingProgress({
      state: 'preparing',
      statuses: statusesFor(targets, 'preparing'),
      overallMessage: 'Preparing to post...',
      overallProgress: 0,
      startTime,
      isCancellable: true,
    });
  }

  static posting(targets: Iterable<PostingTarget>, startTime: Date): PostingProgress {
    const statuses = statusesFor(targets, 'posting');
    return new PostingProgress({
      state: 'posting',
      statuses,
      overallMessage: `Posting to ${plural(statuses.size, 'target')}...`,
      overallProgress: 0.1,
      startTime,
      isCancellable: true,
    });
  }

  static completed(result: PostResult, startTime: Date): PostingProgress {
    const statuses = new Map<string, PlatformPostingStatus>();
    for (const [key, outcome] of result.entries()) {
      statuses.set(
        key,
        outcome.success
          ? targetStatus(outcome, 'completed')
          : targetStatus(outcome, 'failed', { error: outcome.error, errorType: outcome.errorType }),
      );
    }
    return new PostingProgress({
      state: 'completed',
      statuses,
      overallMessage: result.getSummaryMessage(),
      overallProgress: 1,
      startTime,
      endTime: new Date(),
      result,
    });
  }

  static cancelled(targets: Iterable<PostingTarget>, startTime: Date, result?: PostResult): PostingProgress {
    return new PostingProgress({
      state: 'cancelled',
      statuses: statusesFor(targets, 'cancelled'),
      overallMessage: 'Posting cancelled',
      startTime,
      endTime: new Date(),
      result,
    });
  }

  static failed(
    targets: Iterable<PostingTarget>,
    errorMessage: string,
    startTime: Date,
    result?: PostResult,
  ): PostingProgress {
    const statuses = new Map<string, PlatformPostingStatus>();
    for (const target of targets) {
      statuses.set(
        targetKey(target.platform, target.accountId),
        targetStatus(target, 'failed', { error: errorMessage, errorType: 'unknownError' }),
      );
    }
    return new PostingProgress({
      state: 'failed',
      statuses,
      overallMessage: `Posting failed: ${errorMessage}`,
      startTime,
      endTime: new Date(),
      result,
    });
  }

  // ---- Transitions ----

  /** Replace one target's status and recompute the overall fraction. */
  updateTargetStatus(status: PlatformPostingStatus): PostingProgress {
    const statuses = new Map(this.statuses);
    statuses.set(targetKey(status.platform, status.accountId), status);

    let done = 0;
    for (const s of statuses.values()) {
      if (s.state === 'completed' || s.state === 'failed') done++;
    }
    const overallProgress = statuses.size > 0 ? 0.1 + (done / statuses.size) * 0.9 : 0;

    return new PostingProgress({
      state: this.state,
      statuses,
      overallMessage: this.overallMessage,
      overallProgress,
      startTime: this.startTime,
      endTime: this.endTime,
      result: this.result,
      isCancellable: this.isCancellable,
    });
  }

  // ---- Queries ----

  get isInProgress(): boolean {
    return this.state === 'preparing' || this.state === 'posting';
  }

  get isComplete(): boolean {
    return this.state === 'completed' || this.state === 'failed' || this.state === 'cancelled';
  }

  /** Elapsed milliseconds, measured to now while still running. */
  get durationMs(): number | undefined {
    if (!this.startTime) return undefined;
    return (this.endTime ?? new Date()).getTime() - this.startTime.getTime();
  }

  get successfulTargets(): string[] {
    return this.keysIn('completed');
  }

  get failedTargets(): string[] {
    return this.keysIn('failed');
  }

  get inProgressTargets(): string[] {
    return [...this.keysIn('preparing'), ...this.keysIn('posting')];
  }

  toString(): string {
    return `PostingProgress(${this.state}, ${this.statuses.size} targets, ${this.overallProgress ?? '-'})`;
  }

  private keysIn(state: TargetPostingState): string[] {
    const keys: string[] = [];
    for (const [key, status] of this.statuses) if (status.state === state) keys.push(key);
    return keys;
  }
}
