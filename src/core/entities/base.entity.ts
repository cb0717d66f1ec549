import { randomUUID } from 'node:crypto';

/**
 * Identificador de entidad: UUID textual de 128 bits. Es la única suposición
 * estructural que el repositorio genérico hace sobre sus entidades.
 */
export type EntityId = string;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export const EMPTY_ENTITY_ID: EntityId = '00000000-0000-0000-0000-000000000000';

/**
 * Estructura mínima que toda entidad persistida por el repositorio genérico debe tener.
 */
export type GuidEntity = {
  id: EntityId;
};

/**
 * Constructor sin argumentos que el mapeador usa para hidratar instancias.
 */
export type EntityClass<TEntity extends GuidEntity> = new () => TEntity;

export const isEntityId = (value: unknown): value is EntityId =>
  typeof value === 'string' && UUID_PATTERN.test(value);

export const newEntityId = (): EntityId => randomUUID();

/**
 * `true` cuando el identificador falta o es el UUID vacío.
 */
export const isMissingId = (id: EntityId | null | undefined): boolean =>
  !id || id === EMPTY_ENTITY_ID;
