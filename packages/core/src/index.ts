export * from './verification/index.js';
export * from './audit/index.js';
