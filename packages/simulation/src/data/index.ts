export * from './validation.js';
export * from './in-memory-provider.js';
