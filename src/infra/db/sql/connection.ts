import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

import { DataSource, type DataSourceOptions } from 'typeorm';

import { env, type AppEnv } from '@config/index.js';
import { logger } from '@infra/logger/logger.js';

import { ENTITIES } from './entities.js';
import { PinoTypeOrmLogger } from './typeorm-logger.js';

type DatabaseConfig = Pick<
  AppEnv,
  'NODE_ENV' | 'DATABASE_TYPE' | 'DATABASE_PATH' | 'DATABASE_URL' | 'DATABASE_SYNCHRONIZE' | 'DATABASE_LOGGING'
>;

const IN_MEMORY = ':memory:';

/**
 * Traduce la configuración validada a opciones de TypeORM. `synchronize` nunca se
 * activa en producción.
 */
export const buildDataSourceOptions = (config: DatabaseConfig = env): DataSourceOptions => {
  const common = {
    entities: ENTITIES,
    synchronize: config.DATABASE_SYNCHRONIZE && config.NODE_ENV !== 'production',
    logging: config.DATABASE_LOGGING,
    logger: new PinoTypeOrmLogger()
  };

  if (config.DATABASE_TYPE === 'postgres') {
    return {
      ...common,
      type: 'postgres',
      url: config.DATABASE_URL
    };
  }

  const database = config.DATABASE_PATH === IN_MEMORY ? IN_MEMORY : resolve(process.cwd(), config.DATABASE_PATH);

  return {
    ...common,
    type: 'better-sqlite3',
    database
  };
};

let dataSourcePromise: Promise<DataSource> | null = null;

/**
 * Inicializa un `DataSource` singleton para todo el proceso.
 */
export const connectDatabase = async (options: DataSourceOptions = buildDataSourceOptions()): Promise<DataSource> => {
  if (!dataSourcePromise) {
    if (options.type === 'better-sqlite3' && options.database !== IN_MEMORY) {
      mkdirSync(dirname(options.database), { recursive: true });
    }

    const dataSource = new DataSource(options);

    dataSourcePromise = dataSource
      .initialize()
      .then((initialized) => {
        logger.info({ type: options.type }, 'Conexión a la base de datos establecida');
        return initialized;
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Error al conectar con la base de datos');
        dataSourcePromise = null;
        throw error;
      });
  }

  return dataSourcePromise;
};

export const disconnectDatabase = async (): Promise<void> => {
  if (!dataSourcePromise) {
    return;
  }

  const dataSource = await dataSourcePromise;
  dataSourcePromise = null;

  if (dataSource.isInitialized) {
    await dataSource.destroy();
    logger.info('Conexión a la base de datos cerrada');
  }
};
