export * from './scenario.js';
export * from './step-result.js';
export * from './debug.js';
export * from './account.js';
