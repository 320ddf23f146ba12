/** Social networks fanpost knows how to address. */
export type PlatformId = 'mastodon' | 'bluesky' | 'nostr' | 'microblog' | 'x';

export interface PlatformInfo {
  id: PlatformId;
  displayName: string;
  /** Maximum post length in characters. */
  characterLimit: number;
}

export const PLATFORMS: Readonly<Record<PlatformId, PlatformInfo>> = {
  mastodon: { id: 'mastodon', displayName: 'Mastodon', characterLimit: 500 },
  bluesky: { id: 'bluesky', displayName: 'Bluesky', characterLimit: 300 },
  nostr: { id: 'nostr', displayName: 'Nostr', characterLimit: 800 },
  microblog: { id: 'microblog', displayName: 'Micro.blog', characterLimit: 280 },
  x: { id: 'x', displayName: 'X', characterLimit: 280 },
};

export const PLATFORM_IDS: readonly PlatformId[] = ['mastodon', 'bluesky', 'nostr', 'microblog', 'x'];

export function isPlatformId(value: unknown): value is PlatformId {
  return typeof value === 'string' && Object.hasOwn(PLATFORMS, value);
}

/** Resolve a platform id, throwing on unknown input. */
export function platformFromId(id: string): PlatformInfo {
  if (!isPlatformId(id)) {
    throw new Error(`Unknown platform ID: ${id}`);
  }
  return PLATFORMS[id];
}

export function platformName(id: PlatformId): string {
  return PLATFORMS[id].displayName;
}
