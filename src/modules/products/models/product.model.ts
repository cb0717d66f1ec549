import 'reflect-metadata';

import { Column, Entity, PrimaryColumn } from 'typeorm';

import { decimalTransformer } from '@shared/db/transformers.js';

/**
 * Producto del catálogo. El precio se guarda como decimal(18,2) y se expone como número.
 */
@Entity({ name: 'products' })
export class Product {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  public id!: string;

  @Column({ type: 'varchar', length: 200 })
  public name!: string;

  @Column({ type: 'decimal', precision: 18, scale: 2, transformer: decimalTransformer })
  public price!: number;
}
