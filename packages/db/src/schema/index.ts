export * from './minor-reports.js';
export * from './moderation.js';
export * from './account-links.js';
