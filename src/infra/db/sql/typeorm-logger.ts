import type { Logger as OrmLogger } from 'typeorm';

import { logger, type AppLogger } from '@infra/logger/logger.js';

/**
 * Redirige los logs de TypeORM al logger de la aplicación. Las consultas se emiten en
 * nivel `debug`; los errores y las consultas lentas, en `error` y `warn`.
 */
export class PinoTypeOrmLogger implements OrmLogger {
  constructor(private readonly output: AppLogger = logger) {}

  public logQuery(query: string, parameters?: unknown[]): void {
    this.output.debug({ query, parameters }, 'SQL');
  }

  public logQueryError(error: string | Error, query: string, parameters?: unknown[]): void {
    this.output.error({ err: error, query, parameters }, 'Error en consulta SQL');
  }

  public logQuerySlow(time: number, query: string, parameters?: unknown[]): void {
    this.output.warn({ durationMs: time, query, parameters }, 'Consulta SQL lenta');
  }

  public logSchemaBuild(message: string): void {
    this.output.debug(message);
  }

  public logMigration(message: string): void {
    this.output.info(message);
  }

  public log(level: 'log' | 'info' | 'warn', message: unknown): void {
    if (level === 'warn') {
      this.output.warn({ detail: message }, 'TypeORM');
      return;
    }

    this.output.info({ detail: message }, 'TypeORM');
  }
}
