/**
 * secp256k1 key handling with x-only (even-y) public keys.
 */

import { secp256k1 } from '@noble/curves/secp256k1';
import { bytesToNumberBE, numberToBytesBE } from '@noble/curves/abstract/utils';
import { randomBytes } from '@noble/hashes/utils';

import { KeyFormatError, KeyRangeError } from '../errors/types.js';
import { bytesToKeyHex, decodeNpub, decodeNsec, hexToKeyBytes, isHexKey, npubEncode, nsecEncode } from './bech32.js';

const { ProjectivePoint: Point } = secp256k1;

/** Curve order. */
export const CURVE_ORDER = secp256k1.CURVE.n;

export interface KeyPair {
  secretKey: Uint8Array;
  /** x-only public key, 64 lowercase hex characters. */
  publicKey: string;
  nsec: string;
  npub: string;
}

export function isValidScalar(d: bigint): boolean {
  return d > 0n && d < CURVE_ORDER;
}

/** Read a 32-byte secret as a scalar, throwing when it is outside [1, n-1]. */
export function secretToScalar(secretKey: Uint8Array): bigint {
  if (secretKey.length !== 32) {
    throw new KeyFormatError(`Secret key must be 32 bytes, got ${secretKey.length}`);
  }
  const d = bytesToNumberBE(secretKey);
  if (!isValidScalar(d)) throw new KeyRangeError();
  return d;
}

/**
 * The scalar that actually signs: `d` when `d*G` has an even y coordinate,
 * `n - d` otherwise.
 */
export function effectiveSecretScalar(secretKey: Uint8Array): bigint {
  const d = secretToScalar(secretKey);
  const { y } = Point.BASE.multiply(d).toAffine();
  return y % 2n === 0n ? d : CURVE_ORDER - d;
}

/** x coordinate of `d*G` as 32-byte big-endian hex. */
export function derivePublicKey(secretKey: Uint8Array): string {
  const d = secretToScalar(secretKey);
  const { x } = Point.BASE.multiply(d).toAffine();
  return bytesToKeyHex(numberToBytesBE(x, 32));
}

export function keyPairFromSecret(secretKey: Uint8Array): KeyPair {
  const publicKey = derivePublicKey(secretKey);
  return {
    secretKey: Uint8Array.from(secretKey),
    publicKey,
    nsec: nsecEncode(secretKey),
    npub: npubEncode(publicKey),
  };
}

/** Fresh key pair from the platform CSPRNG, redrawn until the scalar is in range. */
export function generateKeyPair(): KeyPair {
  for (;;) {
    const candidate = randomBytes(32);
    if (isValidScalar(bytesToNumberBE(candidate))) {
      return keyPairFromSecret(candidate);
    }
  }
}

/**
 * Parse a secret key given as 64-character hex or `nsec1...`.
 *
 * @throws KeyFormatError on malformed input
 * @throws KeyRangeError when the scalar is zero or not below the curve order
 */
export function parseSecretKey(text: string): Uint8Array {
  const trimmed = text.trim();
  let bytes: Uint8Array;
  if (trimmed.toLowerCase().startsWith('nsec1')) {
    bytes = decodeNsec(trimmed);
  } else if (isHexKey(trimmed)) {
    bytes = hexToKeyBytes(trimmed);
  } else {
    throw new KeyFormatError('Secret key must be 64 hex characters or an nsec1 string');
  }
  secretToScalar(bytes);
  return bytes;
}

/** Parse a public key given as 64-character hex or `npub1...`; returns lowercase hex. */
export function parsePublicKey(text: string): string {
  const trimmed = text.trim();
  if (trimmed.toLowerCase().startsWith('npub1')) return decodeNpub(trimmed);
  if (isHexKey(trimmed)) return trimmed.toLowerCase();
  throw new KeyFormatError('Public key must be 64 hex characters or an npub1 string');
}
