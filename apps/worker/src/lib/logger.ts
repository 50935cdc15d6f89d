import type { FastifyBaseLogger } from 'fastify';
import { pino } from 'pino';
import type { Env } from '../config/index.js';

type LoggerEnv = Pick<Env, 'FLOWQA_NODE_ENV' | 'FLOWQA_LOG_LEVEL'>;

/**
 * Returns Pino logger options for the Fastify instance.
 * In development: pretty-printed with colors.
 * In production/test: compact JSON on stdout.
 */
export function buildLoggerOptions(env: LoggerEnv) {
  const isDev = env.FLOWQA_NODE_ENV === 'development';
  if (env.FLOWQA_LOG_LEVEL === 'silent') {
    return false as const;
  }

  return {
    level: env.FLOWQA_LOG_LEVEL,
    ...(isDev && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  };
}

/**
 * Standalone logger for code that runs outside a request (queue worker, scripts).
 */
export function createLogger(env: LoggerEnv): Logger {
  const options = buildLoggerOptions(env);
  return pino(options === false ? { level: 'silent' } : options);
}

export type Logger = FastifyBaseLogger;
