import type { Express, Request, Response } from 'express';

import { productRouter } from '@modules/products/controllers/product.controller.js';

/**
 * Registra las rutas HTTP principales. Cada módulo expone su propio router.
 */
export const registerHttpRoutes = (app: Express): void => {
  app.use('/products', productRouter);

  /**
   * @swagger
   * /health:
   *   get:
   *     tags: [Health]
   *     summary: Estado del servicio
   *     responses:
   *       200:
   *         description: "{ status: 'ok', timestamp }"
   */
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      timestamp: new Date().toISOString()
    });
  });
};
