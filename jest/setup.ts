import { transports } from 'winston';

import { logger } from '@src/logger';

/**
 * Tests that assert on logs swap this for an ArrayTransport.
 */
logger.clear().add(new transports.Console({ silent: true }));
