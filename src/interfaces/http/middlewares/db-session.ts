import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { DataSource } from 'typeorm';

import { ApplicationError } from '@core/errors/application-error.js';
import { DbSession } from '@infra/db/sql/db-session.js';
import { logger } from '@infra/logger/logger.js';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      dbSession?: DbSession;
      abortSignal?: AbortSignal;
    }
  }
}

/**
 * Abre una `DbSession` por petición y la libera cuando se cierra la respuesta. Si el
 * cliente corta la conexión antes de terminar, la señal de la petición se aborta.
 */
export const createDbSessionMiddleware =
  (dataSource: DataSource): RequestHandler =>
  (req: Request, res: Response, next: NextFunction): void => {
    const session = new DbSession(dataSource);
    const abortController = new AbortController();

    req.dbSession = session;
    req.abortSignal = abortController.signal;

    res.on('close', () => {
      if (!res.writableFinished) {
        abortController.abort(new Error('El cliente cerró la conexión'));
      }

      session.dispose().catch((error: unknown) => {
        logger.error({ err: error, sessionId: session.id }, 'Error al liberar la sesión de base de datos');
      });
    });

    next();
  };

export const requireDbSession = (req: Request): DbSession => {
  if (!req.dbSession) {
    throw new ApplicationError('La petición no tiene una sesión de base de datos', {
      statusCode: 500,
      code: 'DB_SESSION_MISSING'
    });
  }

  return req.dbSession;
};
