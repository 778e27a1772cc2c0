import { destination, pino, type Logger, type LoggerOptions } from 'pino';
import type { Env } from '../config/index.js';

/**
 * Returns Pino logger options.
 * In development: pretty-printed with colors.
 * In production/test: compact JSON.
 * Either way the output goes to stderr; stdout belongs to the MCP transport.
 */
export function buildLoggerOptions(
  env: Pick<Env, 'PANEL_NODE_ENV' | 'PANEL_LOG_LEVEL'>,
): LoggerOptions {
  const isDev = env.PANEL_NODE_ENV === 'development';

  return {
    level: env.PANEL_LOG_LEVEL,
    ...(isDev && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    }),
  };
}

export function createLogger(env: Pick<Env, 'PANEL_NODE_ENV' | 'PANEL_LOG_LEVEL'>): Logger {
  const options = buildLoggerOptions(env);
  // A transport owns its own destination; plain JSON is written straight to fd 2
  return options.transport ? pino(options) : pino(options, destination(2));
}

/** Logger that discards everything. Default for components built without one. */
export const silentLogger: Logger = pino({ level: 'silent' });

export type { Logger };
