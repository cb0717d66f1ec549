import type { ObjectLiteral, SelectQueryBuilder } from 'typeorm';

import type { FilterOperator, SortDirection } from '@core/contracts/specification.js';
import { ArgumentError } from '@core/errors/repository-errors.js';

/**
 * Forma plana de una condición tal como llega al traductor. Cualquier `FilterCondition`
 * tipada encaja en ella.
 */
export interface FilterConditionData {
  readonly field: string;
  readonly operator: FilterOperator;
  readonly value?: unknown;
}

export interface SortClauseData {
  readonly field: string;
  readonly direction: SortDirection;
}

export interface SpecificationData {
  readonly filters: readonly FilterConditionData[];
  readonly sort: readonly SortClauseData[];
  readonly skip?: number;
  readonly take?: number;
}

const COMPARISON_SQL = {
  eq: '=',
  ne: '<>',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<='
} as const;

const escapeLike = (value: string): string => value.replace(/[\\%_]/g, (match) => `\\${match}`);

const resolveColumn = <TEntity extends ObjectLiteral>(
  qb: SelectQueryBuilder<TEntity>,
  field: string,
  argumentName: string
): string => {
  const column = qb.expressionMap.mainAlias?.metadata.findColumnWithPropertyName(field);
  if (!column) {
    throw new ArgumentError(`El campo "${field}" no existe en la entidad`, argumentName);
  }

  return `${qb.alias}.${column.propertyPath}`;
};

const requireText = (condition: FilterConditionData): string => {
  if (typeof condition.value !== 'string') {
    throw new ArgumentError(`El operador "${condition.operator}" requiere un texto`, 'filter');
  }

  return condition.value;
};

/**
 * Agrega las condiciones al query builder, combinadas con AND. Los valores viajan siempre
 * como parámetros; los nombres de campo se validan contra la metadata de la entidad.
 */
export const applyCriteria = <TEntity extends ObjectLiteral>(
  qb: SelectQueryBuilder<TEntity>,
  filters: readonly FilterConditionData[]
): SelectQueryBuilder<TEntity> => {
  const offset = Object.keys(qb.getParameters()).length;

  filters.forEach((condition, index) => {
    const column = resolveColumn(qb, condition.field, 'filter');
    const parameter = `filter_${offset + index}`;

    switch (condition.operator) {
      case 'isNull':
        qb.andWhere(`${column} IS NULL`);
        return;
      case 'in': {
        if (!Array.isArray(condition.value)) {
          throw new ArgumentError('El operador "in" requiere una lista de valores', 'filter');
        }
        if (condition.value.length === 0) {
          qb.andWhere('1 = 0');
          return;
        }
        qb.andWhere(`${column} IN (:...${parameter})`, { [parameter]: condition.value });
        return;
      }
      case 'contains':
        qb.andWhere(`${column} LIKE :${parameter} ESCAPE '\\'`, {
          [parameter]: `%${escapeLike(requireText(condition))}%`
        });
        return;
      case 'startsWith':
        qb.andWhere(`${column} LIKE :${parameter} ESCAPE '\\'`, {
          [parameter]: `${escapeLike(requireText(condition))}%`
        });
        return;
      default: {
        const { value } = condition;
        if (value === null || value === undefined) {
          if (condition.operator === 'eq') {
            qb.andWhere(`${column} IS NULL`);
            return;
          }
          if (condition.operator === 'ne') {
            qb.andWhere(`${column} IS NOT NULL`);
            return;
          }
          throw new ArgumentError(`El operador "${condition.operator}" no admite un valor nulo`, 'filter');
        }
        qb.andWhere(`${column} ${COMPARISON_SQL[condition.operator]} :${parameter}`, { [parameter]: value });
      }
    }
  });

  return qb;
};

export const applySort = <TEntity extends ObjectLiteral>(
  qb: SelectQueryBuilder<TEntity>,
  sort: readonly SortClauseData[]
): SelectQueryBuilder<TEntity> => {
  for (const clause of sort) {
    qb.addOrderBy(resolveColumn(qb, clause.field, 'orderBy'), clause.direction);
  }

  return qb;
};

export const applySpecification = <TEntity extends ObjectLiteral>(
  qb: SelectQueryBuilder<TEntity>,
  spec: SpecificationData
): SelectQueryBuilder<TEntity> => {
  applyCriteria(qb, spec.filters);
  applySort(qb, spec.sort);

  if (spec.skip !== undefined) {
    qb.skip(spec.skip);
  }
  if (spec.take !== undefined) {
    qb.take(spec.take);
  }

  return qb;
};

