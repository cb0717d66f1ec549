import { pino, type LoggerOptions, type TransportMultiOptions } from 'pino';

import { env } from '@config/index.js';

/**
 * Crea una instancia compartida de logger basada en Pino. En desarrollo se habilita
 * un transporte "pretty" para facilitar la lectura, mientras que en producción se
 * emiten logs JSON listos para ingesta.
 */
const createTransport = (): TransportMultiOptions | undefined => {
  if (env.NODE_ENV !== 'development') {
    return undefined;
  }

  return {
    targets: [
      {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l'
        }
      }
    ]
  } satisfies TransportMultiOptions;
};

const resolveLevel = (): string => {
  if (env.LOG_LEVEL) {
    return env.LOG_LEVEL;
  }

  if (env.NODE_ENV === 'test') {
    return 'silent';
  }

  return env.NODE_ENV === 'production' ? 'info' : 'debug';
};

const options: LoggerOptions = {
  level: resolveLevel(),
  transport: createTransport(),
  base: {
    service: 'generic-repository-api'
  }
};

export const logger = pino(options);

export type AppLogger = typeof logger;
