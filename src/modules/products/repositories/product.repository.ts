import type { DbSession } from '@infra/db/sql/db-session.js';
import { GenericRepository } from '@infra/db/sql/generic.repository.js';

import { Product } from '../models/product.model.js';

export class ProductRepository extends GenericRepository<Product> {
  constructor(session: DbSession) {
    super(session, Product);
  }
}
