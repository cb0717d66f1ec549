import { ArgumentOutOfRangeError } from '../errors/repository-errors.js';

/**
 * Especificaciones de consulta expresadas como datos. Los repositorios las traducen a
 * SQL parametrizado, de modo que ningún cursor o query builder del ORM cruza la frontera
 * del repositorio y una especificación puede serializarse tal cual.
 */

export type FieldOf<TEntity> = Extract<keyof TEntity, string>;

export type ComparisonOperator = 'eq' | 'ne' | 'gt' | 'gte' | 'lt' | 'lte';

export type TextOperator = 'contains' | 'startsWith';

export type FilterOperator = ComparisonOperator | TextOperator | 'in' | 'isNull';

export type SortDirection = 'ASC' | 'DESC';

export type FilterCondition<TEntity> = {
  [Field in FieldOf<TEntity>]:
    | { readonly field: Field; readonly operator: ComparisonOperator; readonly value: TEntity[Field] | null }
    | { readonly field: Field; readonly operator: 'in'; readonly value: readonly TEntity[Field][] }
    | { readonly field: Field; readonly operator: TextOperator; readonly value: string }
    | { readonly field: Field; readonly operator: 'isNull' };
}[FieldOf<TEntity>];

/**
 * Conjunto de condiciones combinadas con AND. Una lista vacía no filtra nada.
 */
export type Criteria<TEntity> = readonly FilterCondition<TEntity>[];

export interface SortClause<TEntity> {
  readonly field: FieldOf<TEntity>;
  readonly direction: SortDirection;
}

export interface Specification<TEntity> {
  readonly filters: Criteria<TEntity>;
  readonly sort: readonly SortClause<TEntity>[];
  readonly skip?: number;
  readonly take?: number;
}

const assertNonNegativeInteger = (name: string, value: number): void => {
  if (!Number.isInteger(value) || value < 0) {
    throw new ArgumentOutOfRangeError(name, value, 'debe ser un entero mayor o igual a 0');
  }
};

/**
 * Builder inmutable de especificaciones: cada llamada devuelve un builder nuevo, por lo
 * que un builder base puede compartirse y extenderse sin efectos laterales.
 *
 * @example
 * const spec = specification<Product>()
 *   .where({ field: 'price', operator: 'gte', value: 10 })
 *   .orderBy('name')
 *   .build();
 */
export class SpecificationBuilder<TEntity> {
  private constructor(private readonly state: Specification<TEntity>) {}

  public static empty<TEntity>(): SpecificationBuilder<TEntity> {
    return new SpecificationBuilder<TEntity>({ filters: [], sort: [] });
  }

  public static from<TEntity>(spec: Specification<TEntity>): SpecificationBuilder<TEntity> {
    return new SpecificationBuilder<TEntity>(spec);
  }

  public where(condition: FilterCondition<TEntity>): SpecificationBuilder<TEntity> {
    return new SpecificationBuilder<TEntity>({
      ...this.state,
      filters: [...this.state.filters, condition]
    });
  }

  public whereAll(criteria: Criteria<TEntity>): SpecificationBuilder<TEntity> {
    return new SpecificationBuilder<TEntity>({
      ...this.state,
      filters: [...this.state.filters, ...criteria]
    });
  }

  /**
   * Agrega un criterio de orden. Las llamadas sucesivas desempatan a las anteriores.
   */
  public orderBy(field: FieldOf<TEntity>, direction: SortDirection = 'ASC'): SpecificationBuilder<TEntity> {
    return new SpecificationBuilder<TEntity>({
      ...this.state,
      sort: [...this.state.sort, { field, direction }]
    });
  }

  public skip(count: number): SpecificationBuilder<TEntity> {
    assertNonNegativeInteger('skip', count);
    return new SpecificationBuilder<TEntity>({ ...this.state, skip: count });
  }

  public take(count: number): SpecificationBuilder<TEntity> {
    assertNonNegativeInteger('take', count);
    return new SpecificationBuilder<TEntity>({ ...this.state, take: count });
  }

  public build(): Specification<TEntity> {
    return Object.freeze({
      ...this.state,
      filters: Object.freeze([...this.state.filters]),
      sort: Object.freeze([...this.state.sort])
    });
  }
}

export const specification = <TEntity>(): SpecificationBuilder<TEntity> => SpecificationBuilder.empty<TEntity>();

/**
 * Composición de consulta provista por quien llama: recibe el builder base y devuelve
 * uno extendido. Alternativa a pasar una especificación ya construida.
 */
export type SpecificationComposer<TEntity> = (
  builder: SpecificationBuilder<TEntity>
) => SpecificationBuilder<TEntity>;
