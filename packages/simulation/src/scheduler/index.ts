export * from './rebalance-dates.js';
export * from './price-book.js';
export * from './backtester.js';
