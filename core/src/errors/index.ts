export * from './types.js';
export * from './classify.js';
export * from './error-handler.js';
