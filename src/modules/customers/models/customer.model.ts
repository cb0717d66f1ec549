import 'reflect-metadata';

import { Column, Entity, Index, PrimaryColumn } from 'typeorm';

@Entity({ name: 'customers' })
export class Customer {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  public id!: string;

  @Index()
  @Column({ type: 'varchar', length: 200 })
  public name!: string;

  @Column({ type: 'boolean', default: true })
  public active: boolean = true;

  @Column({ type: Date })
  public createdAt: Date = new Date();
}
