import { describe, it, expect, beforeAll, beforeEach, afterAll } from '@jest/globals';
import type { DataSource } from 'typeorm';
import { z } from 'zod';

import { createHttpApp } from '@interfaces/http/server.js';

import { createMockProduct } from '../../fixtures/index.js';
import { clearTestDB, setupTestDB, teardownTestDB } from '../../helpers/database.helper.js';
import { startTestClient, type TestClient } from '../../helpers/http.helper.js';

const productSchema = z.object({
  id: z.string().uuid(),
  name: z.string(),
  price: z.number()
});

const itemsSchema = z.object({ items: z.array(productSchema) });

const MISSING_ID = '5a2c8e1f-3b4d-4f6a-9c7e-1d2b3a4c5e6f';

describe('Product controller', () => {
  let dataSource: DataSource;
  let client: TestClient;

  const names = (body: unknown): string[] => itemsSchema.parse(body).items.map((item) => item.name);

  const seed = async (): Promise<string[]> => {
    const products = [
      createMockProduct({ name: 'Monitor', price: 199.9 }),
      createMockProduct({ name: 'Raton', price: 19.5 }),
      createMockProduct({ name: 'Teclado', price: 49.9 })
    ];
    await dataSource.manager.save(products);
    return products.map((product) => product.id);
  };

  beforeAll(async () => {
    dataSource = await setupTestDB();
    client = await startTestClient(createHttpApp(dataSource));
  });

  beforeEach(async () => {
    await clearTestDB(dataSource);
  });

  afterAll(async () => {
    await client.close();
    await teardownTestDB(dataSource);
  });

  describe('GET /health', () => {
    it('debe responder ok', async () => {
      const response = await client.get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'ok', timestamp: expect.any(String) });
    });
  });

  describe('POST /products', () => {
    it('debe crear el producto con id generado y Location', async () => {
      const response = await client.post('/products', { name: 'Lámpara', price: 35.5 });

      expect(response.status).toBe(201);
      const { product } = z.object({ product: productSchema }).parse(response.body);
      expect(product).toEqual({ id: product.id, name: 'Lámpara', price: 35.5 });
      expect(response.headers.location).toBe(`/products/${product.id}`);

      const fetched = await client.get(`/products/${product.id}`);
      expect(fetched.body).toEqual({ product });
    });

    it('debe rechazar un cuerpo inválido', async () => {
      const response = await client.post('/products', { name: '', price: -1 });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({ code: 'INVALID_INPUT', message: 'Datos inválidos' });
    });

    it('debe crear varios productos con /bulk', async () => {
      const response = await client.post('/products/bulk', [
        { name: 'Silla', price: 45 },
        { id: MISSING_ID, name: 'Mesa', price: 120 }
      ]);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ created: 2 });
      expect((await client.get(`/products/${MISSING_ID}`)).status).toBe(200);
    });
  });

  describe('GET /products/:id', () => {
    it('debe responder 404 si no existe', async () => {
      const response = await client.get(`/products/${MISSING_ID}`);

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        code: 'PRODUCT_NOT_FOUND',
        message: 'Producto no encontrado',
        metadata: { id: MISSING_ID }
      });
    });

    it('debe responder 400 si el id no es un uuid', async () => {
      const response = await client.get('/products/no-es-un-uuid');

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({ code: 'INVALID_INPUT' });
    });
  });

  describe('lecturas', () => {
    beforeEach(async () => {
      await seed();
    });

    it('debe listar todos los productos', async () => {
      const response = await client.get('/products');

      expect(response.status).toBe(200);
      expect(names(response.body).sort()).toEqual(['Monitor', 'Raton', 'Teclado']);
    });

    it('debe buscar por nombre y rango de precio', async () => {
      expect(names((await client.get('/products/search?name=ecl')).body)).toEqual(['Teclado']);
      expect(names((await client.get('/products/search?minPrice=20&maxPrice=200')).body).sort()).toEqual([
        'Monitor',
        'Teclado'
      ]);
    });

    it('debe componer filtro y orden en /query', async () => {
      const response = await client.get('/products/query?minPrice=20&sort=price&dir=desc');

      expect(names(response.body)).toEqual(['Monitor', 'Teclado']);
    });

    it('debe ordenar por nombre ascendente por defecto en /query', async () => {
      expect(names((await client.get('/products/query')).body)).toEqual(['Monitor', 'Raton', 'Teclado']);
    });

    it('debe paginar con total y número de páginas', async () => {
      const response = await client.get('/products/paged?page=2&pageSize=2');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ page: 2, pageSize: 2, total: 3, totalPages: 2 });
      expect(names(response.body)).toEqual(['Teclado']);
    });

    it('debe rechazar una página fuera de rango', async () => {
      const response = await client.get('/products/paged?page=0');

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({ code: 'ARGUMENT_OUT_OF_RANGE', metadata: { argument: 'page' } });
    });

    it('debe indicar si existe un nombre exacto', async () => {
      expect((await client.get('/products/exists?name=Teclado')).body).toEqual({ exists: true });
      expect((await client.get('/products/exists?name=Tecla')).body).toEqual({ exists: false });
    });

    it('debe contar por rango de precio', async () => {
      expect((await client.get('/products/count')).body).toEqual({ count: 3 });
      expect((await client.get('/products/count?maxPrice=50')).body).toEqual({ count: 2 });
    });

    it('debe informar que no hay transacción activa', async () => {
      expect((await client.get('/products/tx-active')).body).toEqual({ active: false });
    });
  });

  describe('PUT /products', () => {
    it('debe reemplazar el producto de la ruta', async () => {
      const [id] = await seed();

      const response = await client.put(`/products/${id}`, { name: 'Monitor 4K', price: 349 });

      expect(response.status).toBe(204);
      expect((await client.get(`/products/${id}`)).body).toEqual({
        product: { id, name: 'Monitor 4K', price: 349 }
      });
    });

    it('debe rechazar un id de cuerpo distinto al de la ruta', async () => {
      const [id] = await seed();

      const response = await client.put(`/products/${id}`, { id: MISSING_ID, name: 'Otro', price: 1 });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({ code: 'ID_MISMATCH' });
    });

    it('debe responder 409 si el producto no existe', async () => {
      const response = await client.put(`/products/${MISSING_ID}`, { name: 'Fantasma', price: 1 });

      expect(response.status).toBe(409);
      expect(response.body).toMatchObject({ code: 'CONCURRENCY_CONFLICT' });
    });

    it('debe actualizar en lote cuando todos traen id', async () => {
      const [first, second] = await seed();

      const response = await client.put('/products/bulk', [
        { id: first, name: 'Monitor', price: 1 },
        { id: second, name: 'Raton', price: 2 }
      ]);

      expect(response.status).toBe(204);
      expect((await client.get('/products/count?maxPrice=2')).body).toEqual({ count: 2 });
    });

    it('debe rechazar el lote si algún elemento no trae id', async () => {
      const [first] = await seed();

      const response = await client.put('/products/bulk', [
        { id: first, name: 'Monitor', price: 1 },
        { name: 'Sin id', price: 2 }
      ]);

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({ code: 'MISSING_ID' });
    });
  });

  describe('DELETE /products/:id', () => {
    it('debe eliminar y responder 409 si se repite', async () => {
      const [id] = await seed();

      expect((await client.delete(`/products/${id}`)).status).toBe(204);
      expect((await client.get(`/products/${id}`)).status).toBe(404);

      const repeated = await client.delete(`/products/${id}`);
      expect(repeated.status).toBe(409);
      expect(repeated.body).toMatchObject({ code: 'CONCURRENCY_CONFLICT' });
    });
  });

  describe('POST /products/tx-demo', () => {
    it('debe confirmar las dos inserciones', async () => {
      const response = await client.post('/products/tx-demo');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ ok: true, fail: false });
      expect(names((await client.get('/products/query')).body)).toEqual(['Tx A', 'Tx B']);
    });

    it('debe revertir ambas inserciones si falla', async () => {
      const response = await client.post('/products/tx-demo?fail=true');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        code: 'TRANSACTION_DEMO_FAILURE',
        message: 'Fallo provocado para comprobar el rollback'
      });
      expect((await client.get('/products/count')).body).toEqual({ count: 0 });
    });
  });
});
