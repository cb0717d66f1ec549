import '@core/init.js';

import { createServer, type Server } from 'http';

import { env } from '@config/index.js';
import { connectDatabase, disconnectDatabase } from '@infra/db/sql/connection.js';
import { logger } from '@infra/logger/logger.js';
import { createHttpApp } from '@interfaces/http/server.js';

/**
 * Arranca la aplicación conectando la base de datos y levantando el servidor HTTP.
 * Devuelve el servidor para pruebas e integración.
 */
export const bootstrap = async (): Promise<Server> => {
  const dataSource = await connectDatabase();

  const httpServer = createServer(createHttpApp(dataSource));

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Cerrando servidor HTTP');

    httpServer.close((closeError) => {
      if (closeError) {
        logger.error({ err: closeError }, 'Error al cerrar el servidor HTTP');
      }

      disconnectDatabase()
        .catch((error: unknown) => {
          logger.error({ err: error }, 'Error al cerrar la conexión a la base de datos');
          process.exitCode = 1;
        })
        .finally(() => {
          logger.info('Servidor detenido');
        });
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  httpServer.listen(env.PORT, () => {
    logger.info({ port: env.PORT }, 'Servidor HTTP iniciado');
  });

  return httpServer;
};

if (require.main === module) {
  bootstrap().catch((error) => {
    logger.fatal({ err: error }, 'Fallo crítico al iniciar la aplicación');
    process.exitCode = 1;
  });
}
