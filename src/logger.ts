/**
 * Process logger. Writes to stderr: stdout belongs to the MCP stdio transport.
 */

import pino from 'pino';

const level = process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info');
const isDev = process.env.NODE_ENV === 'development';

export const logger = isDev
  ? pino({
      level,
      transport: {
        targets: [{ target: 'pino-pretty', options: { colorize: true, destination: 2 }, level }],
      },
    })
  : pino({ level }, pino.destination(2));

export type Logger = typeof logger;
