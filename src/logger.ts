import pino from 'pino';

import { LOG_LEVEL } from './config.js';

// stderr only: stdout may belong to a tool transport
export const logger = pino(
  { level: LOG_LEVEL },
  LOG_LEVEL === 'silent'
    ? pino.destination(2)
    : pino.transport({
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      }),
);
