/**
 * Strategies Module
 * =================
 */

export * from './types.js';
export * from './define.js';
export * from './multi-factor.js';
export * from './momentum.js';
export * from './value.js';
export * from './growth.js';
export * from './rule.js';
export * from './registry.js';
export * from './selection.js';
export * from './rankings.js';
