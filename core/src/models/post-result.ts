import { isPostErrorType, type PostErrorType } from '../errors/types.js';
import { isPlatformId, platformName, type PlatformId } from './platform.js';

/** Outcome of publishing to a single target. */
export interface TargetOutcome {
  platform: PlatformId;
  accountId?: string;
  success: boolean;
  error?: string;
  errorType?: PostErrorType;
}

export interface AddResultOptions {
  accountId?: string;
  error?: string;
  errorType?: PostErrorType;
}

export interface PostResultJSON {
  content: string;
  timestamp: string;
  outcomes: Record<string, TargetOutcome>;
}

/**
 * Key under which an outcome is stored: `"<platform>:<accountId>"` for an
 * account, the bare platform id otherwise.
 */
export function targetKey(platform: PlatformId, accountId?: string): string {
  return accountId ? `${platform}:${accountId}` : platform;
}

/**
 * Immutable record of one posting run, one outcome per target.
 *
 * Every mutator returns a new instance. Re-adding a target replaces its
 * outcome, so a success always clears an earlier error for that key.
 */
export class PostResult {
  readonly content: string;
  readonly timestamp: Date;
  private readonly outcomes: ReadonlyMap<string, Readonly<TargetOutcome>>;

  constructor(content: string, options: { timestamp?: Date; outcomes?: Iterable<[string, TargetOutcome]> } = {}) {
    this.content = content;
    this.timestamp = options.timestamp ?? new Date();
    const outcomes = new Map<string, Readonly<TargetOutcome>>();
    for (const [key, outcome] of options.outcomes ?? []) {
      outcomes.set(key, Object.freeze({ ...outcome }));
    }
    this.outcomes = outcomes;
    Object.freeze(this);
  }

  /** A result where every target failed with the same message. */
  static allFailed(
    content: string,
    targets: Iterable<{ platform: PlatformId; accountId?: string }>,
    error: string,
    errorType: PostErrorType = 'unknownError',
  ): PostResult {
    let result = new PostResult(content);
    for (const target of targets) {
      result = result.addPlatformResult(target.platform, false, { accountId: target.accountId, error, errorType });
    }
    return result;
  }

  addPlatformResult(platform: PlatformId, success: boolean, options: AddResultOptions = {}): PostResult {
    const outcome: TargetOutcome = { platform, success };
    if (options.accountId) outcome.accountId = options.accountId;
    if (!success) {
      outcome.error = options.error ?? 'Unknown error';
      outcome.errorType = options.errorType ?? 'unknownError';
    }
    const next = new Map(this.outcomes);
    next.set(targetKey(platform, options.accountId), outcome);
    return new PostResult(this.content, { timestamp: this.timestamp, outcomes: next });
  }

  /** Fold in another result's outcomes; `other` wins on shared keys. */
  merge(other: PostResult): PostResult {
    const next = new Map(this.outcomes);
    for (const [key, outcome] of other.entries()) next.set(key, outcome);
    return new PostResult(this.content, { timestamp: this.timestamp, outcomes: next });
  }

  entries(): Array<[string, TargetOutcome]> {
    return [...this.outcomes].map(([key, outcome]): [string, TargetOutcome] => [key, { ...outcome }]);
  }

  outcome(key: string): TargetOutcome | undefined {
    const found = this.outcomes.get(key);
    return found ? { ...found } : undefined;
  }

  get targetKeys(): string[] {
    return [...this.outcomes.keys()];
  }

  get totalTargets(): number {
    return this.outcomes.size;
  }

  get successCount(): number {
    let count = 0;
    for (const outcome of this.outcomes.values()) if (outcome.success) count++;
    return count;
  }

  get failureCount(): number {
    return this.totalTargets - this.successCount;
  }

  get hasErrors(): boolean {
    return this.failureCount > 0;
  }

  get allSuccessful(): boolean {
    return this.totalTargets > 0 && this.failureCount === 0;
  }

  get allFailed(): boolean {
    return this.totalTargets > 0 && this.successCount === 0;
  }

  /** Platforms with at least one successful target. */
  get successfulPlatforms(): PlatformId[] {
    return this.platformsWhere(true);
  }

  /** Platforms with at least one failed target. */
  get failedPlatforms(): PlatformId[] {
    return this.platformsWhere(false);
  }

  isSuccessful(key: string): boolean {
    return this.outcomes.get(key)?.success ?? false;
  }

  getError(key: string): string | undefined {
    return this.outcomes.get(key)?.error;
  }

  getErrorType(key: string): PostErrorType | undefined {
    return this.outcomes.get(key)?.errorType;
  }

  getSummaryMessage(): string {
    const total = this.totalTargets;
    if (total === 0) return 'No targets selected';
    if (this.allSuccessful) return `Successfully posted to all ${total} ${total === 1 ? 'target' : 'targets'}`;
    if (this.allFailed) return `Failed to post to all ${total} ${total === 1 ? 'target' : 'targets'}`;
    return `Posted to ${this.successCount} of ${total} targets successfully`;
  }

  /** One line per failed target, e.g. `Nostr (nostr:abc): connection refused`. */
  getDetailedErrors(): string[] {
    const lines: string[] = [];
    for (const [key, outcome] of this.outcomes) {
      if (outcome.success) continue;
      const label = outcome.accountId ? `${platformName(outcome.platform)} (${key})` : platformName(outcome.platform);
      lines.push(`${label}: ${outcome.error ?? 'Unknown error'}`);
    }
    return lines;
  }

  toJSON(): PostResultJSON {
    return {
      content: this.content,
      timestamp: this.timestamp.toISOString(),
      outcomes: Object.fromEntries(this.entries()),
    };
  }

  static fromJSON(input: unknown): PostResult {
    if (typeof input !== 'object' || input === null) throw new TypeError('PostResult JSON must be an object');
    const record: Record<string, unknown> = { ...input };
    const { content, timestamp, outcomes } = record;
    if (typeof content !== 'string') throw new TypeError('PostResult JSON is missing "content"');
    if (typeof timestamp !== 'string' || Number.isNaN(Date.parse(timestamp))) {
      throw new TypeError('PostResult JSON has an invalid "timestamp"');
    }
    if (typeof outcomes !== 'object' || outcomes === null) throw new TypeError('PostResult JSON is missing "outcomes"');

    const parsed: Array<[string, TargetOutcome]> = [];
    for (const [key, raw] of Object.entries(outcomes)) {
      parsed.push([key, parseOutcome(key, raw)]);
    }
    return new PostResult(content, { timestamp: new Date(timestamp), outcomes: parsed });
  }

  private platformsWhere(success: boolean): PlatformId[] {
    const seen = new Set<PlatformId>();
    for (const outcome of this.outcomes.values()) {
      if (outcome.success === success) seen.add(outcome.platform);
    }
    return [...seen];
  }
}

function parseOutcome(key: string, raw: unknown): TargetOutcome {
  if (typeof raw !== 'object' || raw === null) throw new TypeError(`Outcome "${key}" must be an object`);
  const record: Record<string, unknown> = { ...raw };
  const { platform, accountId, success, error, errorType } = record;
  if (!isPlatformId(platform)) throw new TypeError(`Outcome "${key}" has an unknown platform`);
  if (typeof success !== 'boolean') throw new TypeError(`Outcome "${key}" is missing "success"`);

  const outcome: TargetOutcome = { platform, success };
  if (typeof accountId === 'string') outcome.accountId = accountId;
  if (!success) {
    outcome.error = typeof error === 'string' ? error : 'Unknown error';
    outcome.errorType = isPostErrorType(errorType) ? errorType : 'unknownError';
  }
  return outcome;
}
