import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';
import { z } from 'zod';

import type { Criteria, FilterCondition, SortClause } from '@core/contracts/specification.js';
import { isMissingId } from '@core/entities/base.entity.js';
import { ApplicationError } from '@core/errors/application-error.js';
import { requireDbSession } from '@interfaces/http/middlewares/db-session.js';

import type { Product } from '../models/product.model.js';
import { ProductRepository } from '../repositories/product.repository.js';

export const productRouter = Router();

const booleanQuery = (defaultValue: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(defaultValue)
    .transform((value) => value === 'true');

const priceQuery = z.coerce.number().nonnegative().optional();

const sortQuery = {
  sort: z.enum(['name', 'price']).default('name'),
  dir: z.enum(['asc', 'desc']).default('asc')
};

const listQuerySchema = z.object({
  asNoTracking: booleanQuery('true')
});

const searchQuerySchema = z.object({
  name: z.string().trim().optional(),
  minPrice: priceQuery,
  maxPrice: priceQuery,
  asNoTracking: booleanQuery('true')
});

const composedQuerySchema = z.object({
  minPrice: priceQuery,
  maxPrice: priceQuery,
  ...sortQuery,
  asNoTracking: booleanQuery('true')
});

// El rango de page/pageSize lo valida el repositorio
const pagedQuerySchema = z.object({
  page: z.coerce.number().default(1),
  pageSize: z.coerce.number().default(10),
  name: z.string().trim().optional(),
  ...sortQuery,
  asNoTracking: booleanQuery('true')
});

const existsQuerySchema = z.object({
  name: z.string().min(1)
});

const countQuerySchema = z.object({
  minPrice: priceQuery,
  maxPrice: priceQuery
});

const txDemoQuerySchema = z.object({
  fail: booleanQuery('false')
});

const idParamsSchema = z.object({
  id: z.string().uuid()
});

const productBodySchema = z.object({
  id: z.string().uuid().optional(),
  name: z.string().trim().min(1).max(200),
  price: z.number().nonnegative()
});

const productListSchema = z.array(productBodySchema);

const productRepository = (req: Request): ProductRepository => new ProductRepository(requireDbSession(req));

const priceRange = (minPrice?: number, maxPrice?: number): FilterCondition<Product>[] => {
  const criteria: FilterCondition<Product>[] = [];

  if (minPrice !== undefined) {
    criteria.push({ field: 'price', operator: 'gte', value: minPrice });
  }
  if (maxPrice !== undefined) {
    criteria.push({ field: 'price', operator: 'lte', value: maxPrice });
  }

  return criteria;
};

const nameContains = (name?: string): Criteria<Product> =>
  name ? [{ field: 'name', operator: 'contains', value: name }] : [];

const sortClause = (sort: 'name' | 'price', dir: 'asc' | 'desc'): SortClause<Product> => ({
  field: sort,
  direction: dir === 'desc' ? 'DESC' : 'ASC'
});

const handleError = (error: unknown, next: NextFunction): void => {
  if (error instanceof z.ZodError) {
    next(
      new ApplicationError('Datos inválidos', {
        statusCode: 400,
        code: 'INVALID_INPUT',
        metadata: { errors: error.errors }
      })
    );
    return;
  }

  next(error);
};

/**
 * @swagger
 * /products:
 *   get:
 *     tags: [Products]
 *     summary: Listar todos los productos
 *     parameters:
 *       - in: query
 *         name: asNoTracking
 *         schema:
 *           type: boolean
 *           default: true
 *     responses:
 *       200:
 *         description: Todos los productos, sin paginar
 */
productRouter.get('/', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { asNoTracking } = listQuerySchema.parse(req.query);

    const items = await productRepository(req).findAll({ asNoTracking, signal: req.abortSignal });

    res.status(200).json({ items });
  } catch (error) {
    handleError(error, next);
  }
});

/**
 * @swagger
 * /products/search:
 *   get:
 *     tags: [Products]
 *     summary: Buscar productos por nombre y rango de precio
 *     parameters:
 *       - in: query
 *         name: name
 *         schema:
 *           type: string
 *         description: Texto contenido en el nombre
 *       - in: query
 *         name: minPrice
 *         schema:
 *           type: number
 *       - in: query
 *         name: maxPrice
 *         schema:
 *           type: number
 *     responses:
 *       200:
 *         description: Productos que cumplen todos los filtros
 */
productRouter.get('/search', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { name, minPrice, maxPrice, asNoTracking } = searchQuerySchema.parse(req.query);

    const items = await productRepository(req).find([...nameContains(name), ...priceRange(minPrice, maxPrice)], {
      asNoTracking,
      signal: req.abortSignal
    });

    res.status(200).json({ items });
  } catch (error) {
    handleError(error, next);
  }
});

/**
 * @swagger
 * /products/query:
 *   get:
 *     tags: [Products]
 *     summary: Consulta compuesta con filtro de precio y orden
 *     parameters:
 *       - in: query
 *         name: minPrice
 *         schema:
 *           type: number
 *       - in: query
 *         name: maxPrice
 *         schema:
 *           type: number
 *       - in: query
 *         name: sort
 *         schema:
 *           type: string
 *           enum: [name, price]
 *           default: name
 *       - in: query
 *         name: dir
 *         schema:
 *           type: string
 *           enum: [asc, desc]
 *           default: asc
 *     responses:
 *       200:
 *         description: Productos filtrados y ordenados
 */
productRouter.get('/query', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { minPrice, maxPrice, sort, dir, asNoTracking } = composedQuerySchema.parse(req.query);
    const order = sortClause(sort, dir);

    const items = await productRepository(req).query(
      (builder) => builder.whereAll(priceRange(minPrice, maxPrice)).orderBy(order.field, order.direction),
      { asNoTracking, signal: req.abortSignal }
    );

    res.status(200).json({ items });
  } catch (error) {
    handleError(error, next);
  }
});

/**
 * @swagger
 * /products/paged:
 *   get:
 *     tags: [Products]
 *     summary: Página de productos con total
 *     parameters:
 *       - in: query
 *         name: page
 *         schema:
 *           type: integer
 *           minimum: 1
 *           default: 1
 *       - in: query
 *         name: pageSize
 *         schema:
 *           type: integer
 *           minimum: 1
 *           default: 10
 *       - in: query
 *         name: name
 *         schema:
 *           type: string
 *       - in: query
 *         name: sort
 *         schema:
 *           type: string
 *           enum: [name, price]
 *       - in: query
 *         name: dir
 *         schema:
 *           type: string
 *           enum: [asc, desc]
 *     responses:
 *       200:
 *         description: Página solicitada, total filtrado y número de páginas
 *       400:
 *         description: page o pageSize fuera de rango
 */
productRouter.get('/paged', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { page, pageSize, name, sort, dir, asNoTracking } = pagedQuerySchema.parse(req.query);

    const { items, total } = await productRepository(req).findPaged(
      { page, pageSize, filter: nameContains(name), orderBy: [sortClause(sort, dir)] },
      { asNoTracking, signal: req.abortSignal }
    );

    res.status(200).json({
      page,
      pageSize,
      total,
      totalPages: Math.ceil(total / pageSize),
      items
    });
  } catch (error) {
    handleError(error, next);
  }
});

/**
 * @swagger
 * /products/exists:
 *   get:
 *     tags: [Products]
 *     summary: Comprobar si existe un producto con el nombre exacto
 *     parameters:
 *       - in: query
 *         name: name
 *         required: true
 *         schema:
 *           type: string
 *     responses:
 *       200:
 *         description: "{ exists: boolean }"
 */
productRouter.get('/exists', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { name } = existsQuerySchema.parse(req.query);

    const exists = await productRepository(req).exists([{ field: 'name', operator: 'eq', value: name }], {
      signal: req.abortSignal
    });

    res.status(200).json({ exists });
  } catch (error) {
    handleError(error, next);
  }
});

/**
 * @swagger
 * /products/count:
 *   get:
 *     tags: [Products]
 *     summary: Contar productos en un rango de precio
 *     responses:
 *       200:
 *         description: "{ count: number }"
 */
productRouter.get('/count', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { minPrice, maxPrice } = countQuerySchema.parse(req.query);

    const count = await productRepository(req).count(priceRange(minPrice, maxPrice), { signal: req.abortSignal });

    res.status(200).json({ count });
  } catch (error) {
    handleError(error, next);
  }
});

/**
 * @swagger
 * /products/tx-active:
 *   get:
 *     tags: [Products]
 *     summary: Indica si la sesión de la petición tiene una transacción activa
 *     responses:
 *       200:
 *         description: "{ active: boolean }"
 */
productRouter.get('/tx-active', (req: Request, res: Response, next: NextFunction) => {
  try {
    res.status(200).json({ active: productRepository(req).hasActiveTransaction() });
  } catch (error) {
    handleError(error, next);
  }
});

/**
 * @swagger
 * /products/{id}:
 *   get:
 *     tags: [Products]
 *     summary: Obtener un producto por id
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema:
 *           type: string
 *           format: uuid
 *     responses:
 *       200:
 *         description: Producto encontrado
 *       404:
 *         description: Producto no encontrado
 */
productRouter.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { id } = idParamsSchema.parse(req.params);

    const product = await productRepository(req).findById(id, { signal: req.abortSignal });
    if (!product) {
      throw new ApplicationError('Producto no encontrado', {
        statusCode: 404,
        code: 'PRODUCT_NOT_FOUND',
        metadata: { id }
      });
    }

    res.status(200).json({ product });
  } catch (error) {
    handleError(error, next);
  }
});

/**
 * @swagger
 * /products:
 *   post:
 *     tags: [Products]
 *     summary: Crear un producto
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/ProductInput'
 *     responses:
 *       201:
 *         description: Producto creado; el id se genera si no viene en el cuerpo
 */
productRouter.post('/', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const payload = productBodySchema.parse(req.body);
    const repository = productRepository(req);

    const product = repository.create(payload);
    await repository.add(product, { signal: req.abortSignal });

    res.status(201).location(`${req.baseUrl}/${product.id}`).json({ product });
  } catch (error) {
    handleError(error, next);
  }
});

/**
 * @swagger
 * /products/bulk:
 *   post:
 *     tags: [Products]
 *     summary: Crear varios productos en un solo envío
 *     responses:
 *       200:
 *         description: "{ created: number }"
 */
productRouter.post('/bulk', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const payload = productListSchema.parse(req.body);
    const repository = productRepository(req);

    const products = payload.map((item) => repository.create(item));
    await repository.addRange(products, { signal: req.abortSignal });

    res.status(200).json({ created: products.length });
  } catch (error) {
    handleError(error, next);
  }
});

/**
 * @swagger
 * /products/tx-demo:
 *   post:
 *     tags: [Products]
 *     summary: Inserta "Tx A" y "Tx B" dentro de una transacción
 *     parameters:
 *       - in: query
 *         name: fail
 *         schema:
 *           type: boolean
 *           default: false
 *         description: Provoca un fallo después de ambas inserciones
 *     responses:
 *       200:
 *         description: Transacción confirmada
 *       500:
 *         description: Transacción revertida, no se persiste nada
 */
productRouter.post('/tx-demo', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { fail } = txDemoQuerySchema.parse(req.query);
    const repository = productRepository(req);
    const signal = req.abortSignal;

    await repository.executeInTransaction(
      async () => {
        await repository.add(repository.create({ name: 'Tx A', price: 10 }), { signal });
        await repository.add(repository.create({ name: 'Tx B', price: 20 }), { signal });

        if (fail) {
          throw new ApplicationError('Fallo provocado para comprobar el rollback', {
            statusCode: 500,
            code: 'TRANSACTION_DEMO_FAILURE'
          });
        }
      },
      { signal }
    );

    res.status(200).json({ ok: true, fail });
  } catch (error) {
    handleError(error, next);
  }
});

/**
 * @swagger
 * /products/bulk:
 *   put:
 *     tags: [Products]
 *     summary: Actualizar varios productos; todos deben traer id
 *     responses:
 *       204:
 *         description: Productos actualizados
 *       400:
 *         description: Algún elemento no trae id
 */
productRouter.put('/bulk', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const payload = productListSchema.parse(req.body);

    if (payload.some((item) => isMissingId(item.id))) {
      throw new ApplicationError('Todos los productos deben tener id', {
        statusCode: 400,
        code: 'MISSING_ID'
      });
    }

    const repository = productRepository(req);
    await repository.updateRange(
      payload.map((item) => repository.create(item)),
      { signal: req.abortSignal }
    );

    res.status(204).send();
  } catch (error) {
    handleError(error, next);
  }
});

/**
 * @swagger
 * /products/{id}:
 *   put:
 *     tags: [Products]
 *     summary: Reemplazar un producto
 *     responses:
 *       204:
 *         description: Producto actualizado
 *       400:
 *         description: El id del cuerpo no coincide con el de la ruta
 *       409:
 *         description: El producto no existe
 */
productRouter.put('/:id', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { id } = idParamsSchema.parse(req.params);
    const payload = productBodySchema.parse(req.body);

    if (!isMissingId(payload.id) && payload.id !== id) {
      throw new ApplicationError('El id del cuerpo no coincide con el de la ruta', {
        statusCode: 400,
        code: 'ID_MISMATCH',
        metadata: { routeId: id, bodyId: payload.id }
      });
    }

    const repository = productRepository(req);
    await repository.update(repository.create({ ...payload, id }), { signal: req.abortSignal });

    res.status(204).send();
  } catch (error) {
    handleError(error, next);
  }
});

/**
 * @swagger
 * /products/{id}:
 *   delete:
 *     tags: [Products]
 *     summary: Eliminar un producto
 *     responses:
 *       204:
 *         description: Producto eliminado
 *       409:
 *         description: No existía un producto con ese id
 */
productRouter.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { id } = idParamsSchema.parse(req.params);
    const repository = productRepository(req);

    await repository.delete(repository.create({ id }), { signal: req.abortSignal });

    res.status(204).send();
  } catch (error) {
    handleError(error, next);
  }
});
