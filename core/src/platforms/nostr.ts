/**
 * Nostr platform service.
 *
 * Posts are kind 1 text notes signed with the account's `private_key` and
 * published to the service's relay list. Images go to the account's Blossom
 * server first and their URLs are appended to the note.
 */

import { classifyRelayRejection, errorMessage } from '../errors/classify.js';
import type { ErrorHandler } from '../errors/error-handler.js';
import { ConfigError, RelayError, SocialPlatformError, type PostErrorType } from '../errors/types.js';
import type { Account } from '../models/account.js';
import type { PlatformId } from '../models/platform.js';
import type { PostData } from '../models/post-data.js';
import type { PostResult } from '../models/post-result.js';
import { appendMediaUrls, expectedBlobUrl, uploadToBlossom } from '../nostr/blossom.js';
import { finalizeEvent, KIND_TEXT_NOTE } from '../nostr/event.js';
import { parseSecretKey } from '../nostr/keys.js';
import { isValidRelayUrl, RelayClient, type PublishSummary } from '../nostr/relay-client.js';
import { SocialPlatformService, type PlatformServiceDeps } from './interface.js';

export const DEFAULT_RELAYS: readonly string[] = Object.freeze([
  'wss://relay.damus.io',
  'wss://nos.lol',
  'wss://relay.snort.social',
  'wss://relay.nostr.band',
]);

/** How many relays `authenticate` and `validateConnection` probe. */
const PROBE_RELAY_COUNT = 3;

export interface NostrServiceDeps extends PlatformServiceDeps {
  relays?: readonly string[];
  relayClient?: RelayClient;
  errorHandler?: ErrorHandler;
  /** Used for Blossom uploads. */
  fetch?: typeof fetch;
  uploadTimeoutMs?: number;
}

function checkRelayUrls(urls: readonly string[]): string[] {
  const invalid = urls.filter((url) => !isValidRelayUrl(url));
  if (invalid.length > 0) {
    throw new ConfigError(`Invalid relay URL(s): ${invalid.join(', ')}`);
  }
  return [...new Set(urls)];
}

/** Rejection prefixes that mean this key may not write here. */
const POLICY_REJECTIONS = new Set(['auth-required', 'restricted', 'blocked']);

function isPolicyRejection(error: unknown): boolean {
  return (
    error instanceof RelayError &&
    error.code === 'rejected' &&
    error.reasonPrefix !== null &&
    POLICY_REJECTIONS.has(error.reasonPrefix)
  );
}

/** Failure type when no relay accepted the event. */
function failureTypeFor(summary: PublishSummary): PostErrorType {
  if (summary.failures.length === 0) return 'networkError';
  if (summary.failures.every(({ error }) => isPolicyRejection(error))) return 'authenticationError';

  const types = summary.failures.map(({ error }) =>
    error instanceof RelayError && error.code === 'rejected' ? classifyRelayRejection(error) : 'networkError',
  );
  if (types.every((t) => t === 'rateLimitError')) return 'rateLimitError';
  if (types.every((t) => t === 'serverError')) return 'serverError';
  return 'networkError';
}

export class NostrService extends SocialPlatformService {
  readonly platform: PlatformId = 'nostr';

  private relayList: string[];
  private readonly client: RelayClient;
  private readonly errorHandler?: ErrorHandler;
  private readonly fetchImpl?: typeof fetch;
  private readonly uploadTimeoutMs?: number;

  constructor(deps: NostrServiceDeps = {}) {
    super(deps);
    this.relayList = deps.relays && deps.relays.length > 0 ? checkRelayUrls(deps.relays) : [...DEFAULT_RELAYS];
    this.client = deps.relayClient ?? new RelayClient();
    this.errorHandler = deps.errorHandler;
    this.fetchImpl = deps.fetch;
    this.uploadTimeoutMs = deps.uploadTimeoutMs;
  }

  override get requiredCredentialFields(): readonly string[] {
    return ['private_key'];
  }

  override get supportsMediaUploads(): boolean {
    return true;
  }

  override get maxMediaAttachments(): number {
    return 4;
  }

  get relays(): readonly string[] {
    return this.relayList;
  }

  /** Replace the relay list. An empty list restores the defaults. */
  updateRelays(relays: readonly string[]): void {
    this.relayList = relays.length > 0 ? checkRelayUrls(relays) : [...DEFAULT_RELAYS];
  }

  /** Platform match, a parseable `private_key`, and valid `relays` URLs if given. */
  override validateCredentials(account: Account): boolean {
    if (!super.validateCredentials(account)) return false;

    const key = account.getStringCredential('private_key');
    if (key !== undefined) {
      try {
        parseSecretKey(key);
      } catch {
        return false;
      }
    }
    return account.getListCredential('relays').every(isValidRelayUrl);
  }

  async authenticate(account: Account): Promise<boolean> {
    if (!this.hasRequiredCredentials(account)) {
      throw new SocialPlatformError('nostr', 'invalidCredentials', 'Invalid Nostr credentials or key format');
    }

    if (await this.probeRelays()) return true;
    throw new SocialPlatformError('nostr', 'networkError', 'Unable to connect to any Nostr relay');
  }

  async validateConnection(account: Account): Promise<boolean> {
    if (!this.hasRequiredCredentials(account)) return false;
    return this.probeRelays();
  }

  async publishPost(content: string, account: Account): Promise<PostResult> {
    try {
      if (!this.isContentValid(content)) {
        return this.createFailureResult(
          content,
          `Content exceeds ${this.platformName} character limit of ${this.characterLimit}`,
          'contentTooLong',
          account,
        );
      }
      if (!this.hasRequiredCredentials(account)) {
        return this.createFailureResult(content, 'Invalid Nostr credentials or key format', 'invalidCredentials', account);
      }

      const secretKey = this.secretKeyOf(account);
      const event = finalizeEvent({ kind: KIND_TEXT_NOTE, content, tags: [] }, secretKey);
      const summary = await this.client.publishToAll(this.relayList, event);

      if (summary.successCount > 0) {
        console.log(`[nostr] Published ${event.id} to ${summary.successCount}/${this.relayList.length} relays`);
        return this.createSuccessResult(content, account);
      }

      const details = Object.entries(summary.perRelayErrors)
        .map(([url, message]) => `${url}: ${message}`)
        .join('; ');
      return this.createFailureResult(
        content,
        `Failed to publish to any relay${details ? ` (${details})` : ''}`,
        failureTypeFor(summary),
        account,
      );
    } catch (err) {
      this.errorHandler?.logError('Nostr publish', err, { platform: 'nostr', context: { accountId: account.id } });
      return this.handleError(content, err, account);
    }
  }

  override async publishPostWithMedia(post: PostData, account: Account): Promise<PostResult> {
    if (post.media.length === 0) return this.publishPost(post.content, account);
    if (post.media.length > this.maxMediaAttachments) {
      return this.createFailureResult(
        post.content,
        `Too many media attachments (max: ${this.maxMediaAttachments})`,
        'contentTooLong',
        account,
      );
    }

    const server = account.getStringCredential('blossom_server')?.trim();
    if (!server) {
      return this.createFailureResult(
        post.content,
        'Blossom server not configured. Add a blossom_server credential to enable image uploads.',
        'platformUnavailable',
        account,
      );
    }
    if (!this.hasRequiredCredentials(account)) {
      return this.createFailureResult(post.content, 'Invalid Nostr credentials or key format', 'invalidCredentials', account);
    }

    // Nothing is uploaded for a post that cannot fit its image URLs.
    const projected = appendMediaUrls(
      post.content,
      post.media.map((attachment) => expectedBlobUrl(server, attachment)),
    );
    if (!this.isContentValid(projected)) {
      return this.createFailureResult(
        post.content,
        `Content with image URLs exceeds ${this.platformName} character limit of ${this.characterLimit}`,
        'contentTooLong',
        account,
      );
    }

    const secretKey = this.secretKeyOf(account);
    const urls: string[] = [];
    for (const attachment of post.media) {
      try {
        urls.push(
          await uploadToBlossom(server, attachment, secretKey, {
            fetch: this.fetchImpl,
            timeoutMs: this.uploadTimeoutMs,
          }),
        );
      } catch (err) {
        this.errorHandler?.logError('Blossom upload', err, {
          platform: 'nostr',
          context: { accountId: account.id, fileName: attachment.fileName },
        });
        const errorType = err instanceof SocialPlatformError ? err.errorType : 'serverError';
        return this.createFailureResult(post.content, `Failed to upload image: ${errorMessage(err)}`, errorType, account);
      }
    }

    return this.publishPost(appendMediaUrls(post.content, urls), account);
  }

  // ---- Internals ----

  private secretKeyOf(account: Account): Uint8Array {
    return parseSecretKey(account.getStringCredential('private_key') ?? '');
  }

  private async probeRelays(): Promise<boolean> {
    const probes = this.relayList.slice(0, PROBE_RELAY_COUNT).map((url) => this.client.testConnection(url));
    const results = await Promise.all(probes);
    return results.some(Boolean);
  }
}
