/**
 * bech32 key encodings (`nsec` / `npub`).
 *
 * Checksums come from @scure/base; the 8-bit <-> 5-bit regrouping is done
 * here so that decoding can reject non-zero leftover bits.
 */

import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { bech32 } from '@scure/base';

import { KeyFormatError } from '../errors/types.js';

/** Upper bound on encoded length; 32-byte keys produce 63 characters. */
const BECH32_LIMIT = 90;

/**
 * Regroup `data` from `from`-bit to `to`-bit values.
 *
 * With `pad` the trailing group is zero-filled. Without it, leftover bits must
 * be fewer than `from` and all zero.
 */
export function convertBits(data: ArrayLike<number>, from: number, to: number, pad: boolean): number[] {
  let acc = 0;
  let bits = 0;
  const out: number[] = [];
  const maxv = (1 << to) - 1;
  const maxAcc = (1 << (from + to - 1)) - 1;

  for (let i = 0; i < data.length; i++) {
    const value = data[i];
    if (value < 0 || value >> from !== 0) {
      throw new KeyFormatError(`Invalid ${from}-bit value: ${value}`);
    }
    acc = ((acc << from) | value) & maxAcc;
    bits += from;
    while (bits >= to) {
      bits -= to;
      out.push((acc >> bits) & maxv);
    }
  }

  if (pad) {
    if (bits > 0) out.push((acc << (to - bits)) & maxv);
  } else if (bits >= from || ((acc << (to - bits)) & maxv) !== 0) {
    throw new KeyFormatError('Invalid padding in bech32 data');
  }
  return out;
}

export function encodeBech32Key(prefix: string, bytes: Uint8Array): string {
  return bech32.encode(prefix, convertBits(bytes, 8, 5, true), BECH32_LIMIT);
}

/** Decode a 32-byte key, checking the human-readable prefix. */
export function decodeBech32Key(expectedPrefix: string, text: string): Uint8Array {
  let decoded: { prefix: string; words: number[] };
  try {
    decoded = bech32.decode(text.trim(), BECH32_LIMIT);
  } catch (err) {
    throw new KeyFormatError(`Invalid bech32 string: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (decoded.prefix !== expectedPrefix) {
    throw new KeyFormatError(`Expected "${expectedPrefix}" prefix, got "${decoded.prefix}"`);
  }

  const bytes = Uint8Array.from(convertBits(decoded.words, 5, 8, false));
  if (bytes.length !== 32) {
    throw new KeyFormatError(`Expected 32 bytes of key data, got ${bytes.length}`);
  }
  return bytes;
}

export const nsecEncode = (secretKey: Uint8Array): string => encodeBech32Key('nsec', secretKey);

export function npubEncode(publicKeyHex: string): string {
  return encodeBech32Key('npub', hexToKeyBytes(publicKeyHex));
}

export const decodeNsec = (text: string): Uint8Array => decodeBech32Key('nsec', text);

export function decodeNpub(text: string): string {
  return bytesToKeyHex(decodeBech32Key('npub', text));
}

// ---- Hex helpers ----

const HEX_KEY = /^[0-9a-fA-F]{64}$/;

export function isHexKey(text: string): boolean {
  return HEX_KEY.test(text);
}

/** Parse a 64-character hex key (case-insensitive). */
export function hexToKeyBytes(hex: string): Uint8Array {
  if (!isHexKey(hex)) {
    throw new KeyFormatError('Key must be 64 hexadecimal characters');
  }
  return hexToBytes(hex.toLowerCase());
}

export function bytesToKeyHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}
