export * from './scenario.schema.js';
export * from './account.schema.js';
export * from './config.schema.js';
