import { createPackageLogger } from '@rebalancer/utils';

export const logger = createPackageLogger('@rebalancer/cli');
