/**
 * Indicators Module
 * =================
 * Causal technical indicators and the per-date snapshot builder.
 */

export * from './base.js';
export * from './rolling.js';
export * from './moving-averages.js';
export * from './rsi.js';
export * from './macd.js';
export * from './bollinger.js';
export * from './momentum.js';
export * from './volatility.js';
export * from './volume.js';
export * from './snapshot.js';
export * from './signal-strength.js';
