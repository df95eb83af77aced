export * from './age.js';
export * from './duration.js';
export * from './cache.js';
export * from './reviewers.js';
export * from './consent.js';
export * from './store.js';
export * from './accounts.js';
export * from './ports.js';
export * from './roles.js';
export * from './card.js';
export * from './workflow.js';
export * from './sweep.js';
