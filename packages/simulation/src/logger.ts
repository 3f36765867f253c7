/**
 * Simulation Package Logger
 * =========================
 * Centralized logger for the simulation package with namespace '@rebalancer/simulation'
 */

import { createPackageLogger } from '@rebalancer/utils';

export const logger = createPackageLogger('@rebalancer/simulation');
