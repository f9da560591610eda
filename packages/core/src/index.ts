export * from './types.js';
export * from './notification-templates.js';
