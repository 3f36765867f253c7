export * from './fees.js';
export * from './ledger.js';
