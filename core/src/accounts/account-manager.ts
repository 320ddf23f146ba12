/**
 * Account persistence.
 *
 * Metadata lives under `account:<id>` and credentials under
 * `credentials:<id>`, so listing accounts never has to read secrets.
 */

import { v4 as uuidv4 } from 'uuid';

import { errorMessage } from '../errors/classify.js';
import { AccountManagerError } from '../errors/types.js';
import { Account, type CredentialValue } from '../models/account.js';
import { platformName, type PlatformId } from '../models/platform.js';
import type { SocialPlatformService } from '../platforms/interface.js';
import type { Storage } from '../storage/interface.js';

const ACCOUNT_PREFIX = 'account:';
const CREDENTIALS_PREFIX = 'credentials:';

export interface NewAccount {
  platform: PlatformId;
  displayName: string;
  username: string;
  credentials: Record<string, CredentialValue>;
  /** Check the connection before saving. Default: true */
  validate?: boolean;
}

function wrap(message: string, err: unknown): AccountManagerError {
  return err instanceof AccountManagerError ? err : new AccountManagerError(`${message}: ${errorMessage(err)}`, { cause: err });
}

export class AccountManager {
  private readonly storage: Storage;
  private readonly services: ReadonlyMap<PlatformId, SocialPlatformService>;
  private accounts: Account[] = [];
  private loaded = false;

  constructor(storage: Storage, services: ReadonlyMap<PlatformId, SocialPlatformService>) {
    this.storage = storage;
    this.services = services;
  }

  /** All accounts, ordered by creation time. Changing the array does not affect the manager. */
  get all(): Account[] {
    return [...this.accounts];
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  /** Read every account from storage. Records that fail to parse are skipped. */
  async loadAccounts(): Promise<Account[]> {
    try {
      const entries = await this.storage.list(ACCOUNT_PREFIX);
      const accounts: Account[] = [];

      for (const entry of entries) {
        const id = entry.key.slice(ACCOUNT_PREFIX.length);
        try {
          const credentials = await this.readCredentials(id);
          accounts.push(Account.fromJSON(JSON.parse(entry.value), credentials));
        } catch (err) {
          console.warn(`[accounts] Skipping unreadable account ${id}: ${errorMessage(err)}`);
        }
      }

      accounts.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
      this.accounts = accounts;
      this.loaded = true;
      return [...accounts];
    } catch (err) {
      throw wrap('Failed to load accounts', err);
    }
  }

  async addAccount(input: NewAccount): Promise<Account> {
    const service = this.requireService(input.platform);
    const account = new Account({
      id: uuidv4(),
      platform: input.platform,
      displayName: input.displayName,
      username: input.username,
      createdAt: new Date(),
      isActive: true,
      credentials: input.credentials,
    });

    if (!service.hasRequiredCredentials(account)) {
      throw new AccountManagerError(this.missingCredentialsMessage(service));
    }
    if ((input.validate ?? true) && !(await this.validateAccount(account))) {
      throw new AccountManagerError('Account authentication failed');
    }

    try {
      await this.persist(account, true);
    } catch (err) {
      throw wrap('Failed to add account', err);
    }
    this.accounts.push(account);
    console.log(`[accounts] Added ${platformName(account.platform)} account ${account.username} (${account.id})`);
    return account;
  }

  /** Replace a stored account. Credentials are rewritten only when the account carries some. */
  async updateAccount(updated: Account): Promise<Account> {
    const index = this.indexOf(updated.id);
    const service = this.services.get(updated.platform);
    if (service && !service.hasRequiredCredentials(updated)) {
      throw new AccountManagerError(this.missingCredentialsMessage(service));
    }

    try {
      await this.persist(updated, Object.keys(updated.credentials).length > 0);
    } catch (err) {
      throw wrap('Failed to update account', err);
    }
    this.accounts[index] = updated;
    return updated;
  }

  async removeAccount(accountId: string): Promise<void> {
    const index = this.indexOf(accountId);
    try {
      await this.storage.delete(ACCOUNT_PREFIX + accountId);
      await this.storage.delete(CREDENTIALS_PREFIX + accountId);
    } catch (err) {
      throw wrap('Failed to remove account', err);
    }
    this.accounts.splice(index, 1);
    console.log(`[accounts] Removed account ${accountId}`);
  }

  async setAccountActive(accountId: string, isActive: boolean): Promise<Account> {
    const existing = this.accounts[this.indexOf(accountId)];
    return this.updateAccount(existing.copyWith({ isActive }));
  }

  getAccountById(accountId: string): Account | undefined {
    return this.accounts.find((a) => a.id === accountId);
  }

  getAccountsForPlatform(platform: PlatformId): Account[] {
    return this.accounts.filter((a) => a.platform === platform);
  }

  getActiveAccountsForPlatform(platform: PlatformId): Account[] {
    return this.accounts.filter((a) => a.platform === platform && a.isActive);
  }

  /** The oldest active account on the platform. */
  getDefaultAccountForPlatform(platform: PlatformId): Account | undefined {
    return this.getActiveAccountsForPlatform(platform)[0];
  }

  /** Connection check through the platform's service; false on any failure. */
  async validateAccount(account: Account): Promise<boolean> {
    const service = this.services.get(account.platform);
    if (!service) return false;
    try {
      return await service.validateConnectionWithRetry(account);
    } catch (err) {
      console.warn(`[accounts] Validation of ${account.id} failed: ${errorMessage(err)}`);
      return false;
    }
  }

  // ---- Internals ----

  private requireService(platform: PlatformId): SocialPlatformService {
    const service = this.services.get(platform);
    if (!service) throw new AccountManagerError(`Unsupported platform: ${platformName(platform)}`);
    return service;
  }

  private indexOf(accountId: string): number {
    const index = this.accounts.findIndex((a) => a.id === accountId);
    if (index === -1) throw new AccountManagerError(`Account not found: ${accountId}`);
    return index;
  }

  private missingCredentialsMessage(service: SocialPlatformService): string {
    return `Missing required credentials for ${service.platformName}: ${service.requiredCredentialFields.join(', ')}`;
  }

  private async persist(account: Account, withCredentials: boolean): Promise<void> {
    await this.storage.set(ACCOUNT_PREFIX + account.id, JSON.stringify(account), { platform: account.platform });
    if (withCredentials) {
      await this.storage.set(CREDENTIALS_PREFIX + account.id, JSON.stringify(account.credentials));
    }
  }

  private async readCredentials(accountId: string): Promise<Record<string, unknown>> {
    const raw = await this.storage.get(CREDENTIALS_PREFIX + accountId);
    if (raw === null) return {};
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new TypeError('Credentials record is not an object');
    }
    return { ...parsed };
  }
}
