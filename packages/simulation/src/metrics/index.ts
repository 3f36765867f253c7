/**
 * Metrics Module
 * ==============
 */

export * from './performance-metrics.js';
export * from './trade-statistics.js';
export * from './rating.js';
export * from './benchmark.js';
export * from './portfolio-summary.js';
