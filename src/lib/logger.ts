// src/lib/logger.ts

import pino, { type Logger } from 'pino';
import type { AppConfig } from '../config/validation.js';

type LoggerConfig = Pick<AppConfig, 'LOG_LEVEL' | 'NODE_ENV'>;

/** The subset of pino options used here; accepted by both pino and Fastify. */
export interface LoggerSettings {
  level: AppConfig['LOG_LEVEL'];
  transport?: {
    target: string;
    options: Record<string, unknown>;
  };
}

/**
 * Logger options shared by the CLI and the Fastify server.
 * Development gets pretty-printed logs; everything else structured JSON.
 *
 * @param destination - File descriptor to write to. The CLI logs to stderr
 *   so that stdout carries only the report.
 */
export function buildLoggerOptions(config: LoggerConfig, destination: 1 | 2 = 1): LoggerSettings {
  if (config.NODE_ENV !== 'development') {
    return { level: config.LOG_LEVEL };
  }

  return {
    level: config.LOG_LEVEL,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
        destination,
      },
    },
  };
}

export function createLogger(config: LoggerConfig, destination: 1 | 2 = 2): Logger {
  const options = buildLoggerOptions(config, destination);
  return options.transport ? pino(options) : pino(options, pino.destination(destination));
}
