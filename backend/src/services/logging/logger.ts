/**
 * Pino logger shared by the whole engine
 *
 * Pretty output in development, JSON records in production, silent under
 * test unless LOG_LEVEL is set.
 */

import pino from 'pino';

type Environment = 'production' | 'development' | 'test';

function currentEnvironment(): Environment {
  const env = process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

const profiles: Record<Environment, pino.LoggerOptions> = {
  production: {
    level: process.env.LOG_LEVEL || 'info',
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { service: 'persona-debate', pid: process.pid },
  },
  development: {
    level: process.env.LOG_LEVEL || 'debug',
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
        messageFormat: '[{module}] {msg}',
      },
    },
  },
  test: {
    level: process.env.LOG_LEVEL || 'silent',
  },
};

export const logger = pino(profiles[currentEnvironment()]);

/**
 * Child logger whose bindings (usually `{ module }`) go on every record
 */
export function createLogger(bindings: Record<string, unknown>) {
  return logger.child(bindings);
}

export interface ServerStartDetails {
  port: number | string;
  maxRounds: number;
  provider: string;
}

export function logStartup(details: ServerStartDetails) {
  logger.info(
    { ...details, nodeEnv: currentEnvironment(), logLevel: logger.level },
    `Debate server listening on port ${details.port}`
  );
}

export function logShutdown(signal: string) {
  logger.info({ signal }, 'Shutting down');
}
