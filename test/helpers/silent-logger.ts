import winston from 'winston';

import type { Logger } from '../../src/shared/logger/logger';

/** A winston logger that writes nothing. Spy on its methods to assert log calls. */
export function createSilentLogger(): Logger {
  return winston.createLogger({
    level: 'debug',
    silent: true,
    transports: [new winston.transports.Console({ silent: true })],
  });
}
