/**
 * OHLCV Package Logger
 */

import { createLogger } from '@candlefold/utils';

export const logger = createLogger('ohlcv');
