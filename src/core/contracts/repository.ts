import type { EntityId, GuidEntity } from '../entities/base.entity.js';
import type { CancellationOptions } from '@shared/utils/cancellation.js';
import type { Criteria, SortClause, Specification, SpecificationComposer } from './specification.js';

/**
 * Opciones de lectura. Por defecto las lecturas no se rastrean: mutar el resultado y
 * guardar cambios no tiene efecto. Quien vaya a modificar y persistir una entidad leída
 * debe pedir `asNoTracking: false`.
 */
export interface ReadOptions extends CancellationOptions {
  asNoTracking?: boolean;
}

export interface PageRequest<TEntity> {
  /** Página solicitada, empezando en 1. */
  page: number;
  pageSize: number;
  filter?: Criteria<TEntity>;
  /** Sin orden explícito la base devuelve un orden inestable entre páginas. */
  orderBy?: readonly SortClause<TEntity>[];
}

export interface PagedResult<TEntity> {
  items: TEntity[];
  total: number;
}

/**
 * Handle explícito de una transacción en curso. Sólo quien la inició la confirma o la
 * revierte; las llamadas anidadas reciben el mismo handle y se ejecutan dentro de ella.
 */
export interface TransactionContext {
  readonly id: string;
  readonly isActive: boolean;
  readonly isRollbackOnly: boolean;
  markRollbackOnly(reason?: unknown): void;
}

export type TransactionalAction<Result> = (transaction: TransactionContext) => Promise<Result>;

export interface TransactionOptions extends CancellationOptions {
  /** Transacción externa a la que unirse en lugar de iniciar una nueva. */
  transaction?: TransactionContext;
}

/**
 * Contrato del repositorio genérico sobre un único tipo de entidad.
 */
export interface Repository<TEntity extends GuidEntity> {
  query(
    input: Specification<TEntity> | SpecificationComposer<TEntity>,
    options?: ReadOptions
  ): Promise<TEntity[]>;
  find(criteria: Criteria<TEntity>, options?: ReadOptions): Promise<TEntity[]>;
  findById(id: EntityId, options?: CancellationOptions): Promise<TEntity | null>;
  findAll(options?: ReadOptions): Promise<TEntity[]>;
  exists(criteria: Criteria<TEntity>, options?: CancellationOptions): Promise<boolean>;
  count(criteria?: Criteria<TEntity>, options?: CancellationOptions): Promise<number>;
  findPaged(request: PageRequest<TEntity>, options?: ReadOptions): Promise<PagedResult<TEntity>>;
  add(entity: TEntity, options?: CancellationOptions): Promise<void>;
  addRange(entities: readonly TEntity[], options?: CancellationOptions): Promise<void>;
  update(entity: TEntity, options?: CancellationOptions): Promise<void>;
  updateRange(entities: readonly TEntity[], options?: CancellationOptions): Promise<void>;
  delete(entity: TEntity, options?: CancellationOptions): Promise<void>;
  saveChanges(options?: CancellationOptions): Promise<number>;
  executeInTransaction<Result>(action: TransactionalAction<Result>, options?: TransactionOptions): Promise<Result>;
  hasActiveTransaction(): boolean;
  dispose(): Promise<void>;
}
