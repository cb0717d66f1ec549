import 'reflect-metadata';

import { DataSource } from 'typeorm';

import { buildDataSourceOptions } from '@infra/db/sql/connection.js';
import { ENTITIES } from '@infra/db/sql/entities.js';

/**
 * Base de datos de test: SQLite en memoria, un esquema nuevo por cada `DataSource`.
 */
export async function setupTestDB(): Promise<DataSource> {
  const dataSource = new DataSource({
    ...buildDataSourceOptions({
      NODE_ENV: 'test',
      DATABASE_TYPE: 'better-sqlite3',
      DATABASE_PATH: ':memory:',
      DATABASE_URL: undefined,
      DATABASE_SYNCHRONIZE: true,
      DATABASE_LOGGING: false
    }),
    dropSchema: true
  });

  return dataSource.initialize();
}

/**
 * Cierra la conexión de test
 */
export async function teardownTestDB(dataSource: DataSource): Promise<void> {
  if (dataSource.isInitialized) {
    await dataSource.destroy();
  }
}

/**
 * Vacía todas las tablas. Útil en beforeEach de los tests de integración
 */
export async function clearTestDB(dataSource: DataSource): Promise<void> {
  for (const entity of ENTITIES) {
    await dataSource.getRepository(entity).clear();
  }
}
