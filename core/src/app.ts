/**
 * Composition root.
 *
 * Builds the storage, services, account manager and orchestrator from a
 * {@link FanpostConfig}. Nothing here is a module-level singleton; callers
 * create a {@link FanpostApp}, use it, and shut it down.
 */

import { AccountManager } from './accounts/account-manager.js';
import type { FanpostConfig } from './config.js';
import { ErrorHandler } from './errors/error-handler.js';
import { PLATFORM_IDS, type PlatformId } from './models/platform.js';
import { RelayClient } from './nostr/relay-client.js';
import { PostOrchestrator } from './orchestrator/post-orchestrator.js';
import type { SocialPlatformService } from './platforms/interface.js';
import { MockPlatformService } from './platforms/mock.js';
import { NostrService } from './platforms/nostr.js';
import { RetryManager } from './retry/retry-manager.js';
import { createStorage, type Storage } from './storage/index.js';

export interface FanpostAppOptions {
  /** Use this store instead of opening `config.storage.dbPath`. */
  storage?: Storage;
  /** Extra or replacement services, keyed by platform. */
  services?: ReadonlyMap<PlatformId, SocialPlatformService>;
  retryManager?: RetryManager;
  errorHandler?: ErrorHandler;
}

export class FanpostApp {
  readonly config: FanpostConfig;
  readonly storage: Storage;
  readonly errorHandler: ErrorHandler;
  readonly retryManager: RetryManager;
  readonly relayClient: RelayClient;
  readonly services: ReadonlyMap<PlatformId, SocialPlatformService>;
  readonly accounts: AccountManager;
  readonly orchestrator: PostOrchestrator;

  private closed = false;

  constructor(config: FanpostConfig, options: FanpostAppOptions = {}) {
    this.config = config;
    this.errorHandler = options.errorHandler ?? new ErrorHandler({ quiet: true });
    this.retryManager = options.retryManager ?? new RetryManager({ errorHandler: this.errorHandler });
    this.relayClient = new RelayClient(config.relay.timeouts);
    this.storage = options.storage ?? createStorage({ dbPath: config.storage.dbPath });

    const services = new Map<PlatformId, SocialPlatformService>();
    if (config.posting.dryRun) {
      // Every platform gets a mock that succeeds without touching the network.
      for (const platform of PLATFORM_IDS) {
        services.set(platform, new MockPlatformService({ platform, mediaSupport: true, retryManager: this.retryManager }));
      }
    } else {
      services.set(
        'nostr',
        new NostrService({
          relays: config.nostr.relays,
          relayClient: this.relayClient,
          retryManager: this.retryManager,
          errorHandler: this.errorHandler,
        }),
      );
    }
    for (const [platform, service] of options.services ?? []) {
      services.set(platform, service);
    }
    this.services = services;

    this.accounts = new AccountManager(this.storage, this.services);
    this.orchestrator = new PostOrchestrator(this.services, {
      retryManager: this.retryManager,
      errorHandler: this.errorHandler,
    });
  }

  /** Load stored accounts. */
  async init(): Promise<void> {
    const accounts = await this.accounts.loadAccounts();
    console.log(`[fanpost] Loaded ${accounts.length} account(s)`);
  }

  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.orchestrator.isPosting) this.orchestrator.cancel();

    try {
      await this.storage.close();
    } catch (err) {
      console.error('[fanpost] Error closing storage:', err);
    }
  }
}
