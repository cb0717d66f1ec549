import { Customer } from '@modules/customers/models/customer.model.js';
import { Product } from '@modules/products/models/product.model.js';

export const ENTITIES = [Product, Customer];
