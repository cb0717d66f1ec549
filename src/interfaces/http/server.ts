import compression from 'compression';
import cors from 'cors';
import express, { type Express } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import swaggerUi from 'swagger-ui-express';
import type { DataSource } from 'typeorm';

import { env } from '@config/index.js';

import { createDbSessionMiddleware } from './middlewares/db-session.js';
import { globalErrorHandler } from './middlewares/error-handler.js';
import { registerHttpRoutes } from './routes/index.js';
import { getSwaggerSpec } from './swagger.config.js';

/**
 * Crea y configura la aplicación Express aplicando middlewares de seguridad y parsing.
 * Cada petición recibe su propia `DbSession` sobre el `DataSource` indicado.
 */
export const createHttpApp = (dataSource: DataSource): Express => {
  const app = express();

  app.set('trust proxy', 1);

  app.use(
    helmet({
      contentSecurityPolicy: env.NODE_ENV === 'production' ? undefined : false,
      crossOriginEmbedderPolicy: false
    })
  );

  app.use(
    cors({
      origin: [env.CLIENT_APP_URL],
      credentials: true
    })
  );

  app.use(compression());
  app.use(express.json({ limit: '1mb' }));

  app.use(
    rateLimit({
      windowMs: 60_000,
      limit: env.RATE_LIMIT_PER_MINUTE,
      standardHeaders: 'draft-7',
      legacyHeaders: false,
      message: {
        code: 'TOO_MANY_REQUESTS',
        message: 'Demasiadas solicitudes. Por favor, espera un momento antes de intentar de nuevo.'
      }
    })
  );

  // Swagger UI solo en desarrollo
  if (env.NODE_ENV === 'development') {
    app.use(
      '/api-docs',
      swaggerUi.serve,
      swaggerUi.setup(getSwaggerSpec(), {
        customCss: '.swagger-ui .topbar { display: none }',
        customSiteTitle: 'Generic Repository API'
      })
    );
  }

  app.use(createDbSessionMiddleware(dataSource));

  registerHttpRoutes(app);

  app.use(globalErrorHandler);

  return app;
};
