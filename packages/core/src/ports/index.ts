export type { MarketDataPort } from './market-data-port.js';
