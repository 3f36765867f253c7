/**
 * @rebalancer/core
 *
 * Domain types, schemas, ports and date helpers. No dependencies on other
 * workspace packages.
 */

export * from './domain/market/index.js';
export * from './domain/portfolio/index.js';
export * from './ports/index.js';
export * from './time/dates.js';
