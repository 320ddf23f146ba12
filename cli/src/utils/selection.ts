/**
 * Turn `--platform` / `--account` flags into an orchestrator selection.
 */

import { isPlatformId, type Account, type PlatformId } from "@fanpost/core";

export interface TargetSelection {
  platforms: PlatformId[];
  accountsByPlatform: Map<PlatformId, Account[]>;
}

export class SelectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SelectionError";
  }
}

export function parsePlatformIds(ids: readonly string[]): PlatformId[] {
  const out: PlatformId[] = [];
  for (const id of ids) {
    const normalized = id.trim().toLowerCase();
    if (!isPlatformId(normalized)) throw new SelectionError(`Unknown platform: ${id}`);
    if (!out.includes(normalized)) out.push(normalized);
  }
  return out;
}

/** Look up an account by full id or unambiguous id prefix. */
export function findAccount(accounts: readonly Account[], id: string): Account {
  const exact = accounts.find((a) => a.id === id);
  if (exact) return exact;

  const matches = accounts.filter((a) => a.id.startsWith(id));
  if (matches.length === 0) throw new SelectionError(`Unknown account: ${id}`);
  if (matches.length > 1) throw new SelectionError(`Account id prefix ${id} is ambiguous`);
  return matches[0];
}

/**
 * Explicit account ids win. Otherwise every active account of the requested
 * platforms is used, or of every platform that has one when none is named.
 * Platforms named without a usable account are kept so the orchestrator
 * reports them.
 */
export function selectTargets(
  accounts: readonly Account[],
  platformIds: readonly string[] = [],
  accountIds: readonly string[] = [],
): TargetSelection {
  const requested = parsePlatformIds(platformIds);
  const accountsByPlatform = new Map<PlatformId, Account[]>();

  const add = (account: Account) => {
    const list = accountsByPlatform.get(account.platform) ?? [];
    if (!list.some((a) => a.id === account.id)) list.push(account);
    accountsByPlatform.set(account.platform, list);
  };

  if (accountIds.length > 0) {
    for (const id of accountIds) {
      const account = findAccount(accounts, id);
      if (requested.length > 0 && !requested.includes(account.platform)) {
        throw new SelectionError(`Account ${id} is on ${account.platform}, which was not selected`);
      }
      add(account);
    }
  } else {
    for (const account of accounts) {
      if (!account.isActive) continue;
      if (requested.length > 0 && !requested.includes(account.platform)) continue;
      add(account);
    }
  }

  const platforms = requested.length > 0 ? requested : [...accountsByPlatform.keys()];
  return { platforms, accountsByPlatform };
}
