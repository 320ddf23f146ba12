export * from './platform.js';
export * from './account.js';
export * from './post-data.js';
export * from './post-result.js';
export * from './posting-progress.js';
