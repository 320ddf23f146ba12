/**
 * Nostr events (NIP-01): canonical id, signing and verification.
 */

import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, hexToBytes, utf8ToBytes } from '@noble/hashes/utils';

import { derivePublicKey } from './keys.js';
import { signSchnorr, verifySchnorr } from './schnorr.js';

export const KIND_TEXT_NOTE = 1;
export const KIND_BLOSSOM_AUTH = 24242;

/** The fields a caller chooses; `pubkey`, `id` and `sig` are derived. */
export interface EventTemplate {
  kind: number;
  content: string;
  tags?: string[][];
  /** Unix seconds. Defaults to now. */
  created_at?: number;
}

export interface UnsignedEvent {
  pubkey: string;
  created_at: number;
  kind: number;
  tags: string[][];
  content: string;
}

export interface SignedEvent {
  readonly id: string;
  readonly pubkey: string;
  readonly created_at: number;
  readonly kind: number;
  readonly tags: readonly (readonly string[])[];
  readonly content: string;
  readonly sig: string;
}

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/** `JSON.stringify([0, pubkey, created_at, kind, tags, content])` */
export function serializeEvent(event: UnsignedEvent | SignedEvent): string {
  return JSON.stringify([0, event.pubkey, event.created_at, event.kind, event.tags, event.content]);
}

/** Hex SHA-256 of the canonical serialization. */
export function computeEventId(event: UnsignedEvent | SignedEvent): string {
  return bytesToHex(sha256(utf8ToBytes(serializeEvent(event))));
}

/**
 * Sign a template. The returned event and its tags are frozen: changing a
 * field means going through {@link amendEvent}.
 */
export function finalizeEvent(template: EventTemplate, secretKey: Uint8Array): SignedEvent {
  const unsigned: UnsignedEvent = {
    pubkey: derivePublicKey(secretKey),
    created_at: template.created_at ?? nowSeconds(),
    kind: template.kind,
    tags: (template.tags ?? []).map((tag) => [...tag]),
    content: template.content,
  };
  const id = computeEventId(unsigned);
  const sig = bytesToHex(signSchnorr(hexToBytes(id), secretKey));

  return Object.freeze({
    id,
    pubkey: unsigned.pubkey,
    created_at: unsigned.created_at,
    kind: unsigned.kind,
    tags: Object.freeze(unsigned.tags.map((tag) => Object.freeze(tag))),
    content: unsigned.content,
    sig,
  });
}

/** Re-sign `event` with some fields replaced. */
export function amendEvent(event: SignedEvent, changes: Partial<EventTemplate>, secretKey: Uint8Array): SignedEvent {
  return finalizeEvent(
    {
      kind: changes.kind ?? event.kind,
      content: changes.content ?? event.content,
      tags: changes.tags ?? event.tags.map((tag) => [...tag]),
      created_at: changes.created_at ?? event.created_at,
    },
    secretKey,
  );
}

/** Check that `id` matches the fields and `sig` verifies against `pubkey`. */
export function verifyEvent(event: SignedEvent): boolean {
  if (!/^[0-9a-f]{64}$/.test(event.id) || !/^[0-9a-f]{128}$/.test(event.sig)) return false;
  if (!/^[0-9a-f]{64}$/.test(event.pubkey)) return false;
  if (computeEventId(event) !== event.id) return false;
  return verifySchnorr(hexToBytes(event.sig), hexToBytes(event.id), hexToBytes(event.pubkey));
}

export function getTagValue(event: SignedEvent, name: string): string | undefined {
  return event.tags.find((tag) => tag[0] === name)?.[1];
}
