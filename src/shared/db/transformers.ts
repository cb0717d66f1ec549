import type { ValueTransformer } from 'typeorm';

/**
 * Los drivers devuelven `decimal` como texto (pg) o como número (sqlite); la entidad
 * siempre ve un número.
 */
export const decimalTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) => (value === null ? null : Number(value))
};
