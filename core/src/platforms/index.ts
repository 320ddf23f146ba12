export * from './interface.js';
export * from './nostr.js';
export * from './mock.js';
