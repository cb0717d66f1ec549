import { describe, it, expect } from '@jest/globals';

import { isEntityId } from '@core/entities/base.entity.js';
import { Product } from '@modules/products/models/product.model.js';

import { createMockProduct, createMockProducts, createNumberedProducts } from './product.factory.js';

describe('Product Factory', () => {
  it('debe crear un producto con datos válidos', () => {
    const product = createMockProduct();

    expect(product).toBeInstanceOf(Product);
    expect(isEntityId(product.id)).toBe(true);
    expect(product.name.length).toBeGreaterThan(0);
    expect(product.price).toBeGreaterThanOrEqual(1);
  });

  it('debe aplicar overrides correctamente', () => {
    const product = createMockProduct({ name: 'Lámpara', price: 12.5 });

    expect(product.name).toBe('Lámpara');
    expect(product.price).toBe(12.5);
  });

  it('debe crear productos con ids únicos', () => {
    const ids = new Set(createMockProducts(5).map((product) => product.id));

    expect(ids.size).toBe(5);
  });

  it('debe numerar los productos con dos dígitos', () => {
    const products = createNumberedProducts(11);

    expect(products[0].name).toBe('Item-00');
    expect(products[10].name).toBe('Item-10');
    expect(products[10].price).toBe(10);
  });
});
