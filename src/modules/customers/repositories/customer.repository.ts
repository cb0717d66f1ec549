import type { ReadOptions } from '@core/contracts/repository.js';
import { specification } from '@core/contracts/specification.js';
import type { DbSession } from '@infra/db/sql/db-session.js';
import { GenericRepository } from '@infra/db/sql/generic.repository.js';
import type { CancellationOptions } from '@shared/utils/cancellation.js';

import { Customer } from '../models/customer.model.js';

/**
 * Segundo repositorio concreto: muestra cómo una subclase agrega consultas propias
 * componiendo especificaciones sobre la base genérica.
 */
export class CustomerRepository extends GenericRepository<Customer> {
  constructor(session: DbSession) {
    super(session, Customer);
  }

  public async findActive(options: ReadOptions = {}): Promise<Customer[]> {
    return this.query(
      specification<Customer>()
        .where({ field: 'active', operator: 'eq', value: true })
        .orderBy('name')
        .build(),
      options
    );
  }

  public async deactivate(customer: Customer, options: CancellationOptions = {}): Promise<void> {
    customer.active = false;
    await this.update(customer, options);
  }
}
