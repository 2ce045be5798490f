/**
 * Logger utility using Pino
 */
import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

let transport: pino.DestinationStream | undefined;
if (process.env.NODE_ENV !== 'production' && !process.env.VITEST) {
  try {
    transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    });
  } catch {
    // pino-pretty not installed, fall back to JSON lines
  }
}

const rootLogger = transport ? pino({ level }, transport) : pino({ level });

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return rootLogger.child({ name });
}

export { rootLogger as logger };
