import { isPlatformId, type PlatformId } from './platform.js';

/** A credential is a single string or a list of strings (e.g. relay URLs). */
export type CredentialValue = string | string[];

export type Credentials = Readonly<Record<string, CredentialValue>>;

export interface AccountInit {
  id: string;
  platform: PlatformId;
  displayName: string;
  username: string;
  createdAt?: Date;
  isActive?: boolean;
  credentials?: Record<string, CredentialValue>;
}

/** Serialized account metadata. Credentials are stored separately. */
export interface AccountJSON {
  id: string;
  platform: PlatformId;
  displayName: string;
  username: string;
  createdAt: string;
  isActive: boolean;
}

export type AccountPatch = Partial<Omit<AccountInit, 'credentials'>>;

function isCredentialValue(value: unknown): value is CredentialValue {
  return typeof value === 'string' || (Array.isArray(value) && value.every((v) => typeof v === 'string'));
}

function copyCredentials(source: Record<string, CredentialValue>): Record<string, CredentialValue> {
  const out: Record<string, CredentialValue> = {};
  for (const [key, value] of Object.entries(source)) {
    out[key] = Array.isArray(value) ? [...value] : value;
  }
  return out;
}

/**
 * A user's identity on one platform. Instances never change; use
 * {@link Account.copyWith} or {@link Account.withCredentials} to derive a new one.
 */
export class Account {
  readonly id: string;
  readonly platform: PlatformId;
  readonly displayName: string;
  readonly username: string;
  readonly createdAt: Date;
  readonly isActive: boolean;
  readonly credentials: Credentials;

  constructor(init: AccountInit) {
    this.id = init.id;
    this.platform = init.platform;
    this.displayName = init.displayName;
    this.username = init.username;
    this.createdAt = new Date((init.createdAt ?? new Date()).getTime());
    this.isActive = init.isActive ?? true;
    this.credentials = Object.freeze(copyCredentials(init.credentials ?? {}));
    Object.freeze(this);
  }

  copyWith(patch: AccountPatch): Account {
    return new Account({
      id: patch.id ?? this.id,
      platform: patch.platform ?? this.platform,
      displayName: patch.displayName ?? this.displayName,
      username: patch.username ?? this.username,
      createdAt: patch.createdAt ?? this.createdAt,
      isActive: patch.isActive ?? this.isActive,
      credentials: { ...this.credentials },
    });
  }

  withCredentials(credentials: Record<string, CredentialValue>): Account {
    return new Account({ ...this.toInit(), credentials });
  }

  hasCredential(key: string): boolean {
    const value = this.credentials[key];
    if (value === undefined) return false;
    return Array.isArray(value) ? value.length > 0 : value.trim().length > 0;
  }

  getCredential(key: string): CredentialValue | undefined {
    return this.credentials[key];
  }

  /** The credential as a string, or undefined when absent or a list. */
  getStringCredential(key: string): string | undefined {
    const value = this.credentials[key];
    return typeof value === 'string' ? value : undefined;
  }

  /** The credential as a list; a single string becomes a one-element list. */
  getListCredential(key: string): string[] {
    const value = this.credentials[key];
    if (value === undefined) return [];
    return typeof value === 'string' ? [value] : [...value];
  }

  toJSON(): AccountJSON {
    return {
      id: this.id,
      platform: this.platform,
      displayName: this.displayName,
      username: this.username,
      createdAt: this.createdAt.toISOString(),
      isActive: this.isActive,
    };
  }

  toString(): string {
    return `Account(${this.platform}:${this.username})`;
  }

  private toInit(): AccountInit {
    return {
      id: this.id,
      platform: this.platform,
      displayName: this.displayName,
      username: this.username,
      createdAt: this.createdAt,
      isActive: this.isActive,
    };
  }

  static fromJSON(input: unknown, credentials: Record<string, unknown> = {}): Account {
    if (typeof input !== 'object' || input === null) {
      throw new TypeError('Account JSON must be an object');
    }
    const record: Record<string, unknown> = { ...input };
    const { id, platform, displayName, username, createdAt, isActive } = record;

    if (typeof id !== 'string' || id.length === 0) throw new TypeError('Account JSON is missing "id"');
    if (!isPlatformId(platform)) throw new TypeError(`Account ${id} has an unknown platform: ${String(platform)}`);
    if (typeof displayName !== 'string') throw new TypeError(`Account ${id} is missing "displayName"`);
    if (typeof username !== 'string') throw new TypeError(`Account ${id} is missing "username"`);

    let created: Date | undefined;
    if (createdAt !== undefined) {
      if (typeof createdAt !== 'string' || Number.isNaN(Date.parse(createdAt))) {
        throw new TypeError(`Account ${id} has an invalid "createdAt"`);
      }
      created = new Date(createdAt);
    }

    const creds: Record<string, CredentialValue> = {};
    for (const [key, value] of Object.entries(credentials)) {
      if (!isCredentialValue(value)) throw new TypeError(`Account ${id} has a malformed credential "${key}"`);
      creds[key] = value;
    }

    return new Account({
      id,
      platform,
      displayName,
      username,
      createdAt: created,
      isActive: typeof isActive === 'boolean' ? isActive : true,
      credentials: creds,
    });
  }
}
