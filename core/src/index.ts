/**
 * @fanpost/core
 *
 * Compose once, publish to many platforms. Exports the models, the Nostr
 * engine, platform services, the post orchestrator and account management.
 */

export * from './errors/index.js';
export * from './models/index.js';
export * from './nostr/index.js';
export * from './retry/retry-manager.js';
export * from './platforms/index.js';
export * from './orchestrator/post-orchestrator.js';
export * from './storage/index.js';
export * from './accounts/account-manager.js';
export * from './config.js';
export * from './app.js';
