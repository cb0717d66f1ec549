import { randomUUID } from 'node:crypto';

import type {
  DataSource,
  DeepPartial,
  EntityManager,
  EntityMetadata,
  ObjectLiteral,
  QueryRunner,
  SelectQueryBuilder
} from 'typeorm';

import type { TransactionContext } from '@core/contracts/repository.js';
import type { EntityClass, EntityId, GuidEntity } from '@core/entities/base.entity.js';
import {
  ConcurrencyConflictError,
  SessionDisposedError,
  TransactionStateError
} from '@core/errors/repository-errors.js';
import { logger, type AppLogger } from '@infra/logger/logger.js';
import { ensureNotCancelled, withCancellation } from '@shared/utils/cancellation.js';

import { DbTransaction, type TransactionOutcome } from './db-transaction.js';

type ColumnSnapshot = ReadonlyMap<string, unknown>;

interface TrackedEntry {
  entity: GuidEntity;
  snapshot: ColumnSnapshot;
}

export type ChangeKind = 'insert' | 'update' | 'delete';

interface StagedChange {
  kind: ChangeKind;
  entityClass: EntityClass<GuidEntity>;
  entity: GuidEntity;
  /** Columnas a escribir en un update; sin valor se escriben todas. */
  columns?: readonly string[];
}

const comparable = (value: unknown): unknown => (value instanceof Date ? value.getTime() : value);

/**
 * Unidad de trabajo sobre un `DataSource` de TypeORM. Todas las consultas de la sesión
 * usan un único `QueryRunner`, de modo que la transacción activa cubre cualquier
 * repositorio construido sobre la misma sesión.
 *
 * La sesión mantiene:
 * - un mapa de identidad por clase de entidad, con una foto de columnas por entidad
 *   rastreada para detectar cambios;
 * - los cambios preparados (insert, update, delete) hasta el próximo `saveChanges`;
 * - el handle de la transacción en curso, única fuente de verdad sobre si hay una.
 *
 * No es segura para uso concurrente: una sesión corresponde a una petición.
 */
export class DbSession {
  public readonly id = randomUUID();

  private runner: QueryRunner | null = null;

  private readonly tracked = new Map<EntityClass<GuidEntity>, Map<EntityId, TrackedEntry>>();

  private staged: StagedChange[] = [];

  private transaction: DbTransaction | null = null;

  private disposed = false;

  constructor(
    private readonly dataSource: DataSource,
    private readonly log: AppLogger = logger
  ) {}

  public get currentTransaction(): DbTransaction | null {
    return this.transaction;
  }

  public get isDisposed(): boolean {
    return this.disposed;
  }

  public get hasPendingChanges(): boolean {
    return this.staged.length > 0 || this.detectChanges().length > 0;
  }

  public get manager(): EntityManager {
    return this.queryRunner().manager;
  }

  public metadataFor(entityClass: EntityClass<GuidEntity>): EntityMetadata {
    return this.dataSource.getMetadata(entityClass);
  }

  public createQueryBuilder<TEntity extends GuidEntity>(
    entityClass: EntityClass<TEntity>,
    alias: string
  ): SelectQueryBuilder<TEntity> {
    return this.manager.createQueryBuilder(entityClass, alias);
  }

  /**
   * Construye una instancia sin rastrear a partir de valores planos.
   */
  public createEntity<TEntity extends GuidEntity>(
    entityClass: EntityClass<TEntity>,
    values: DeepPartial<TEntity>
  ): TEntity {
    this.assertNotDisposed();
    return this.dataSource.manager.create(entityClass, values);
  }

  /**
   * Búsqueda por clave que consulta primero el mapa de identidad. Si la entidad ya está
   * rastreada se devuelve esa misma instancia sin ir a la base; si no, el resultado de la
   * consulta queda rastreado.
   */
  public async find<TEntity extends GuidEntity>(
    entityClass: EntityClass<TEntity>,
    id: EntityId,
    signal?: AbortSignal
  ): Promise<TEntity | null> {
    ensureNotCancelled(signal);

    const cached = this.lookup(entityClass, id);
    if (cached) {
      return cached;
    }

    const entity = await withCancellation(signal, () =>
      this.createQueryBuilder(entityClass, 'entity').where('entity.id = :id', { id }).getOne()
    );

    return entity ? this.attach(entityClass, entity) : null;
  }

  /**
   * Rastrea una entidad leída. Si ya había una instancia con la misma clave se devuelve
   * la existente, igual que haría una consulta con seguimiento.
   */
  public attach<TEntity extends GuidEntity>(entityClass: EntityClass<TEntity>, entity: TEntity): TEntity {
    const existing = this.lookup(entityClass, entity.id);
    if (existing) {
      return existing;
    }

    this.track(entityClass, entity);
    return entity;
  }

  public attachRange<TEntity extends GuidEntity>(entityClass: EntityClass<TEntity>, entities: TEntity[]): TEntity[] {
    return entities.map((entity) => this.attach(entityClass, entity));
  }

  public isTracked(entityClass: EntityClass<GuidEntity>, entity: GuidEntity): boolean {
    return this.tracked.get(entityClass)?.get(entity.id)?.entity === entity;
  }

  public stageInsert(entityClass: EntityClass<GuidEntity>, entity: GuidEntity): void {
    this.assertNotDisposed();
    this.track(entityClass, entity);
    this.stage({ kind: 'insert', entityClass, entity });
  }

  /**
   * Marca todas las columnas de la entidad como modificadas, cambien o no.
   */
  public stageUpdate(entityClass: EntityClass<GuidEntity>, entity: GuidEntity): void {
    this.assertNotDisposed();
    this.track(entityClass, entity);
    this.stage({ kind: 'update', entityClass, entity });
  }

  public stageDelete(entityClass: EntityClass<GuidEntity>, entity: GuidEntity): void {
    this.assertNotDisposed();
    this.stage({ kind: 'delete', entityClass, entity });
  }

  /**
   * Envía a la base los cambios preparados y los detectados en entidades rastreadas.
   * Sin transacción activa el envío ocurre dentro de una transacción propia, así que
   * o se aplican todos o ninguno. Devuelve el número de filas afectadas.
   */
  public async saveChanges(signal?: AbortSignal): Promise<number> {
    this.assertNotDisposed();
    ensureNotCancelled(signal);

    const changes = [...this.staged, ...this.detectChanges()];
    if (changes.length === 0) {
      return 0;
    }

    if (this.transaction) {
      return this.saveWithinTransaction(this.transaction, changes, signal);
    }

    const transaction = await this.beginTransaction(signal);

    try {
      const affected = await this.flush(changes, signal);
      await transaction.commit();
      this.acceptChanges(changes);
      return affected;
    } catch (error) {
      await transaction.rollbackAfterFailure(error);
      throw error;
    }
  }

  public async beginTransaction(signal?: AbortSignal): Promise<DbTransaction> {
    this.assertNotDisposed();
    ensureNotCancelled(signal);

    if (this.transaction) {
      throw new TransactionStateError(`La sesión ${this.id} ya tiene una transacción activa`);
    }

    const runner = this.queryRunner();
    await runner.startTransaction();

    const transaction = new DbTransaction(
      this.id,
      runner,
      (completed, outcome) => this.onTransactionCompleted(completed, outcome),
      this.log
    );
    this.transaction = transaction;
    this.log.debug({ sessionId: this.id, transactionId: transaction.id }, 'Transacción iniciada');

    return transaction;
  }

  /**
   * `true` si el handle es la transacción activa de esta sesión.
   */
  public ownsTransaction(transaction: TransactionContext): boolean {
    return this.transaction !== null && this.transaction === transaction && transaction.isActive;
  }

  /**
   * Libera la conexión. Una transacción abierta se revierte. Llamarla de nuevo no hace
   * nada; cualquier otro uso posterior lanza `SessionDisposedError`.
   */
  public async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.disposed = true;

    try {
      if (this.transaction) {
        await this.transaction.rollback();
      }
    } finally {
      this.clearTracking();
      if (this.runner) {
        const runner = this.runner;
        this.runner = null;
        await runner.release();
      }
    }
  }

  /**
   * Envío dentro de una transacción ajena, en un savepoint (TypeORM anida
   * `startTransaction`). Si falla se revierte hasta el savepoint, los cambios del lote se
   * descartan y sus entidades dejan de rastrearse.
   */
  private async saveWithinTransaction(
    transaction: DbTransaction,
    changes: readonly StagedChange[],
    signal?: AbortSignal
  ): Promise<number> {
    const runner = this.queryRunner();
    await runner.startTransaction();

    try {
      const affected = await this.flush(changes, signal);
      await runner.commitTransaction();
      this.acceptChanges(changes);
      return affected;
    } catch (error) {
      await this.rollbackToSavepoint(runner, transaction, error);
      this.discardChanges(changes);
      throw error;
    }
  }

  private async rollbackToSavepoint(runner: QueryRunner, transaction: DbTransaction, cause: unknown): Promise<void> {
    try {
      await runner.rollbackTransaction();
      this.log.debug({ sessionId: this.id, transactionId: transaction.id }, 'Lote revertido hasta el savepoint');
    } catch (rollbackError) {
      // Sin savepoint no se sabe qué quedó escrito
      this.log.error({ err: rollbackError, cause, transactionId: transaction.id }, 'Error al revertir el savepoint');
      transaction.markRollbackOnly(cause);
    }
  }

  private async flush(changes: readonly StagedChange[], signal?: AbortSignal): Promise<number> {
    let affected = 0;
    for (const change of changes) {
      ensureNotCancelled(signal);
      affected += await this.apply(change);
    }
    return affected;
  }

  private queryRunner(): QueryRunner {
    this.assertNotDisposed();

    if (!this.runner) {
      this.runner = this.dataSource.createQueryRunner();
    }

    return this.runner;
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw new SessionDisposedError();
    }
  }

  private lookup<TEntity extends GuidEntity>(entityClass: EntityClass<TEntity>, id: EntityId): TEntity | null {
    const entry = this.tracked.get(entityClass)?.get(id);
    return entry && entry.entity instanceof entityClass ? entry.entity : null;
  }

  private track(entityClass: EntityClass<GuidEntity>, entity: GuidEntity): void {
    let entries = this.tracked.get(entityClass);
    if (!entries) {
      entries = new Map<EntityId, TrackedEntry>();
      this.tracked.set(entityClass, entries);
    }

    entries.set(entity.id, { entity, snapshot: this.snapshot(entityClass, entity) });
  }

  private untrack(entityClass: EntityClass<GuidEntity>, entity: GuidEntity): void {
    this.tracked.get(entityClass)?.delete(entity.id);
  }

  private snapshot(entityClass: EntityClass<GuidEntity>, entity: GuidEntity): ColumnSnapshot {
    return new Map(
      this.metadataFor(entityClass).columns.map((column) => [column.propertyName, comparable(column.getEntityValue(entity))])
    );
  }

  private stage(change: StagedChange): void {
    const index = this.staged.findIndex(
      (candidate) => candidate.entityClass === change.entityClass && candidate.entity.id === change.entity.id
    );

    if (index === -1) {
      this.staged.push(change);
      return;
    }

    const previous = this.staged[index];

    // Un insert aún no enviado absorbe los updates y se anula con un delete
    if (previous.kind === 'insert' && change.kind === 'update') {
      this.staged[index] = { ...previous, entity: change.entity };
      return;
    }

    if (previous.kind === 'insert' && change.kind === 'delete') {
      this.staged.splice(index, 1);
      this.untrack(change.entityClass, change.entity);
      return;
    }

    this.staged[index] = change;
  }

  private detectChanges(): StagedChange[] {
    const detected: StagedChange[] = [];

    for (const [entityClass, entries] of this.tracked) {
      const columns = this.metadataFor(entityClass).columns;

      for (const { entity, snapshot } of entries.values()) {
        const alreadyStaged = this.staged.some(
          (change) => change.entityClass === entityClass && change.entity.id === entity.id
        );
        if (alreadyStaged) {
          continue;
        }

        const modified = columns
          .filter((column) => !column.isPrimary)
          .filter((column) => comparable(column.getEntityValue(entity)) !== snapshot.get(column.propertyName))
          .map((column) => column.propertyName);

        if (modified.length > 0) {
          detected.push({ kind: 'update', entityClass, entity, columns: modified });
        }
      }
    }

    return detected;
  }

  private async apply(change: StagedChange): Promise<number> {
    const metadata = this.metadataFor(change.entityClass);
    const { entity } = change;

    switch (change.kind) {
      case 'insert': {
        const result = await this.manager.insert(change.entityClass, entity);
        return result.identifiers.length;
      }
      case 'update': {
        const values: ObjectLiteral = {};
        for (const column of metadata.columns) {
          if (!column.isPrimary && (!change.columns || change.columns.includes(column.propertyName))) {
            values[column.propertyName] = column.getEntityValue(entity);
          }
        }

        const result = await this.manager.update<ObjectLiteral>(change.entityClass, entity.id, values);
        return this.expectAffected(result.affected, metadata.name, entity.id, 'update');
      }
      case 'delete': {
        const result = await this.manager.delete<ObjectLiteral>(change.entityClass, entity.id);
        return this.expectAffected(result.affected, metadata.name, entity.id, 'delete');
      }
    }
  }

  /**
   * Algunos drivers no informan filas afectadas; en ese caso se asume una.
   */
  private expectAffected(
    affected: number | null | undefined,
    entityName: string,
    id: EntityId,
    operation: 'update' | 'delete'
  ): number {
    if (affected === null || affected === undefined) {
      return 1;
    }

    if (affected === 0) {
      throw new ConcurrencyConflictError(entityName, id, operation);
    }

    return affected;
  }

  private acceptChanges(changes: readonly StagedChange[]): void {
    for (const change of changes) {
      if (change.kind === 'delete') {
        this.untrack(change.entityClass, change.entity);
      } else {
        this.track(change.entityClass, change.entity);
      }
    }

    this.staged = [];
  }

  private discardChanges(changes: readonly StagedChange[]): void {
    for (const change of changes) {
      this.untrack(change.entityClass, change.entity);
    }

    this.staged = [];
  }

  private onTransactionCompleted(transaction: DbTransaction, outcome: TransactionOutcome): void {
    if (this.transaction === transaction) {
      this.transaction = null;
    }

    // Tras un rollback nada de lo rastreado o preparado refleja la base
    if (outcome === 'rolledBack') {
      this.clearTracking();
    }
  }

  private clearTracking(): void {
    this.tracked.clear();
    this.staged = [];
  }
}
