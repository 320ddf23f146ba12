/**
 * BIP-340 style Schnorr signatures over secp256k1.
 *
 * Nonces are derived from the signing scalar and the message alone, so the
 * same key and message always give the same signature.
 */

import { schnorr, secp256k1 } from '@noble/curves/secp256k1';
import { bytesToNumberBE, numberToBytesBE } from '@noble/curves/abstract/utils';
import { mod } from '@noble/curves/abstract/modular';
import { sha256 } from '@noble/hashes/sha256';
import { concatBytes, utf8ToBytes } from '@noble/hashes/utils';

import { CURVE_ORDER, effectiveSecretScalar } from './keys.js';

const { ProjectivePoint: Point } = secp256k1;

const tagCache = new Map<string, Uint8Array>();

/** `sha256(sha256(tag) || sha256(tag) || ...parts)` */
export function taggedHash(tag: string, ...parts: Uint8Array[]): Uint8Array {
  let tagHash = tagCache.get(tag);
  if (!tagHash) {
    tagHash = sha256(utf8ToBytes(tag));
    tagCache.set(tag, tagHash);
  }
  return sha256(concatBytes(tagHash, tagHash, ...parts));
}

/**
 * Sign a 32-byte message (an event id).
 *
 * @returns 64-byte signature `R.x || s`
 */
export function signSchnorr(message: Uint8Array, secretKey: Uint8Array): Uint8Array {
  if (message.length !== 32) {
    throw new Error(`Message must be 32 bytes, got ${message.length}`);
  }

  const d = effectiveSecretScalar(secretKey);
  const dBytes = numberToBytesBE(d, 32);
  const px = numberToBytesBE(Point.BASE.multiply(d).toAffine().x, 32);

  let k = mod(bytesToNumberBE(taggedHash('BIP0340/nonce', dBytes, message)), CURVE_ORDER);
  if (k === 0n) k = 1n;

  let R = Point.BASE.multiply(k).toAffine();
  if (R.y % 2n !== 0n) {
    k = CURVE_ORDER - k;
    R = Point.BASE.multiply(k).toAffine();
  }
  const rx = numberToBytesBE(R.x, 32);

  const e = mod(bytesToNumberBE(taggedHash('BIP0340/challenge', rx, px, message)), CURVE_ORDER);
  const s = mod(k + e * d, CURVE_ORDER);

  return concatBytes(rx, numberToBytesBE(s, 32));
}

/** Standard BIP-340 verification. Never throws; malformed input verifies as false. */
export function verifySchnorr(signature: Uint8Array, message: Uint8Array, publicKey: Uint8Array): boolean {
  try {
    return schnorr.verify(signature, message, publicKey);
  } catch {
    return false;
  }
}
