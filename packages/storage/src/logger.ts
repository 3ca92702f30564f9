/**
 * Storage Package Logger
 * ======================
 * Logger for the storage package, namespace 'storage'
 */

import { createLogger } from '@candlefold/utils';

export const logger = createLogger('storage');
