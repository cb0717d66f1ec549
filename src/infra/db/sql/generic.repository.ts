import type { DeepPartial, SelectQueryBuilder } from 'typeorm';

import type {
  PagedResult,
  PageRequest,
  ReadOptions,
  Repository,
  TransactionalAction,
  TransactionContext,
  TransactionOptions
} from '@core/contracts/repository.js';
import {
  SpecificationBuilder,
  type Criteria,
  type Specification,
  type SpecificationComposer
} from '@core/contracts/specification.js';
import { isMissingId, newEntityId, type EntityClass, type EntityId, type GuidEntity } from '@core/entities/base.entity.js';
import { ArgumentOutOfRangeError, TransactionStateError } from '@core/errors/repository-errors.js';
import { logger, type AppLogger } from '@infra/logger/logger.js';
import { ensureNotCancelled, withCancellation, type CancellationOptions } from '@shared/utils/cancellation.js';
import { assertPresent } from '@shared/utils/guards.js';

import type { DbSession } from './db-session.js';
import { applyCriteria, applySort, applySpecification } from './specification.translator.js';

const assertPositiveInteger = (name: string, value: number): void => {
  if (!Number.isInteger(value) || value < 1) {
    throw new ArgumentOutOfRangeError(name, value, 'debe ser un entero mayor o igual a 1');
  }
};

/**
 * Repositorio genérico sobre una `DbSession`. Las subclases sólo fijan la clase de
 * entidad y agregan consultas propias del dominio.
 *
 * Las lecturas no rastrean por defecto. Cada escritura prepara el cambio y lo envía en
 * el acto, dentro de la transacción activa de la sesión si la hay.
 */
export abstract class GenericRepository<TEntity extends GuidEntity> implements Repository<TEntity> {
  protected readonly alias = 'entity';

  protected constructor(
    protected readonly session: DbSession,
    protected readonly entityClass: EntityClass<TEntity>,
    protected readonly log: AppLogger = logger
  ) {}

  /**
   * Fábrica de entidades sin rastrear. Si los valores no traen id se genera uno.
   */
  public create(values: DeepPartial<TEntity>): TEntity {
    const entity = this.session.createEntity(this.entityClass, values);
    if (isMissingId(entity.id)) {
      entity.id = newEntityId();
    }
    return entity;
  }

  public async query(
    input: Specification<TEntity> | SpecificationComposer<TEntity>,
    options: ReadOptions = {}
  ): Promise<TEntity[]> {
    assertPresent(input, 'specification');
    ensureNotCancelled(options.signal);

    const spec = typeof input === 'function' ? input(SpecificationBuilder.empty<TEntity>()).build() : input;
    const qb = applySpecification(this.createQueryBuilder(), spec);

    return this.materialize(await withCancellation(options.signal, () => qb.getMany()), options);
  }

  public async find(criteria: Criteria<TEntity>, options: ReadOptions = {}): Promise<TEntity[]> {
    assertPresent(criteria, 'criteria');
    ensureNotCancelled(options.signal);

    const qb = applyCriteria(this.createQueryBuilder(), criteria);
    return this.materialize(await withCancellation(options.signal, () => qb.getMany()), options);
  }

  public async findById(id: EntityId, options: CancellationOptions = {}): Promise<TEntity | null> {
    assertPresent(id, 'id');
    return this.session.find(this.entityClass, id, options.signal);
  }

  /**
   * Devuelve la tabla completa, sin límite implícito.
   */
  public async findAll(options: ReadOptions = {}): Promise<TEntity[]> {
    ensureNotCancelled(options.signal);

    const qb = this.createQueryBuilder();
    return this.materialize(await withCancellation(options.signal, () => qb.getMany()), options);
  }

  public async exists(criteria: Criteria<TEntity>, options: CancellationOptions = {}): Promise<boolean> {
    assertPresent(criteria, 'criteria');
    ensureNotCancelled(options.signal);

    const qb = applyCriteria(this.createQueryBuilder(), criteria);
    return withCancellation(options.signal, () => qb.getExists());
  }

  public async count(criteria: Criteria<TEntity> = [], options: CancellationOptions = {}): Promise<number> {
    ensureNotCancelled(options.signal);

    const qb = applyCriteria(this.createQueryBuilder(), criteria);
    return withCancellation(options.signal, () => qb.getCount());
  }

  /**
   * Paginación en dos viajes: primero el total filtrado, luego la página ordenada.
   * `page` empieza en 1.
   */
  public async findPaged(request: PageRequest<TEntity>, options: ReadOptions = {}): Promise<PagedResult<TEntity>> {
    assertPresent(request, 'request');
    assertPositiveInteger('page', request.page);
    assertPositiveInteger('pageSize', request.pageSize);
    ensureNotCancelled(options.signal);

    const filter = request.filter ?? [];
    const orderBy = request.orderBy ?? [];

    const total = await withCancellation(options.signal, () =>
      applyCriteria(this.createQueryBuilder(), filter).getCount()
    );

    if (orderBy.length === 0) {
      this.log.debug(
        { entity: this.entityClass.name, page: request.page },
        'Paginación sin orden explícito: el orden entre páginas no es estable'
      );
    }

    const qb = applySort(applyCriteria(this.createQueryBuilder(), filter), orderBy)
      .skip((request.page - 1) * request.pageSize)
      .take(request.pageSize);

    const items = await withCancellation(options.signal, () => qb.getMany());

    return { items: this.materialize(items, options), total };
  }

  public async add(entity: TEntity, options: CancellationOptions = {}): Promise<void> {
    assertPresent(entity, 'entity');
    ensureNotCancelled(options.signal);

    this.session.stageInsert(this.entityClass, entity);
    await this.session.saveChanges(options.signal);
  }

  public async addRange(entities: readonly TEntity[], options: CancellationOptions = {}): Promise<void> {
    assertPresent(entities, 'entities');
    entities.forEach((entity, index) => assertPresent(entity, `entities[${index}]`));
    ensureNotCancelled(options.signal);

    for (const entity of entities) {
      this.session.stageInsert(this.entityClass, entity);
    }
    await this.session.saveChanges(options.signal);
  }

  /**
   * Marca todas las columnas como modificadas y envía el cambio. La instancia pasa a
   * ser la rastreada para su id.
   */
  public async update(entity: TEntity, options: CancellationOptions = {}): Promise<void> {
    assertPresent(entity, 'entity');
    ensureNotCancelled(options.signal);

    this.session.stageUpdate(this.entityClass, entity);
    await this.session.saveChanges(options.signal);
  }

  public async updateRange(entities: readonly TEntity[], options: CancellationOptions = {}): Promise<void> {
    assertPresent(entities, 'entities');
    entities.forEach((entity, index) => assertPresent(entity, `entities[${index}]`));
    ensureNotCancelled(options.signal);

    for (const entity of entities) {
      this.session.stageUpdate(this.entityClass, entity);
    }
    await this.session.saveChanges(options.signal);
  }

  public async delete(entity: TEntity, options: CancellationOptions = {}): Promise<void> {
    assertPresent(entity, 'entity');
    ensureNotCancelled(options.signal);

    this.session.stageDelete(this.entityClass, entity);
    await this.session.saveChanges(options.signal);
  }

  public async saveChanges(options: CancellationOptions = {}): Promise<number> {
    return this.session.saveChanges(options.signal);
  }

  /**
   * Ejecuta la acción dentro de una transacción. Si ya hay una (explícita o la activa de
   * la sesión) la acción se une a ella y sólo su propietario la confirma o revierte.
   */
  public async executeInTransaction<Result>(
    action: TransactionalAction<Result>,
    options: TransactionOptions = {}
  ): Promise<Result> {
    assertPresent(action, 'action');
    ensureNotCancelled(options.signal);

    const ambient = options.transaction ?? this.session.currentTransaction;
    if (ambient) {
      return this.runInline(ambient, action);
    }

    const transaction = await this.session.beginTransaction(options.signal);

    try {
      const result = await action(transaction);
      ensureNotCancelled(options.signal);
      await transaction.commit();
      return result;
    } catch (error) {
      await transaction.rollbackAfterFailure(error);
      throw error;
    } finally {
      await transaction.dispose();
    }
  }

  public hasActiveTransaction(): boolean {
    return this.session.currentTransaction !== null;
  }

  public async dispose(): Promise<void> {
    await this.session.dispose();
  }

  protected createQueryBuilder(): SelectQueryBuilder<TEntity> {
    return this.session.createQueryBuilder(this.entityClass, this.alias);
  }

  /**
   * Resultado de una lectura: con `asNoTracking: false` las entidades pasan al mapa de
   * identidad y una instancia ya rastreada sustituye a la recién leída.
   */
  protected materialize(entities: TEntity[], options: ReadOptions): TEntity[] {
    return options.asNoTracking === false ? this.session.attachRange(this.entityClass, entities) : entities;
  }

  private async runInline<Result>(transaction: TransactionContext, action: TransactionalAction<Result>): Promise<Result> {
    if (!this.session.ownsTransaction(transaction)) {
      throw new TransactionStateError(`La transacción ${transaction.id} no está activa en esta sesión`);
    }

    try {
      return await action(transaction);
    } catch (error) {
      transaction.markRollbackOnly(error);
      throw error;
    }
  }
}
