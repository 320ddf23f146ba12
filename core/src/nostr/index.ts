/**
 * Nostr engine: keys, signatures, events, relay transport and Blossom uploads.
 */

export * from './bech32.js';
export * from './keys.js';
export * from './schnorr.js';
export * from './event.js';
export * from './relay-client.js';
export * from './blossom.js';
