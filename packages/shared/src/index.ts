export * from './logging/logger.js';
export * from './contracts/index.js';
