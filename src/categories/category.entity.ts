import { Entity, PrimaryGeneratedColumn, Column, OneToMany } from 'typeorm';
import { Product } from '../products/product.entity';

@Entity({ name: 'categories' })
export class Category {
  @PrimaryGeneratedColumn({ type: 'int', unsigned: true })
  id!: number;

  @Column({ name: 'name', type: 'varchar', length: 120 })
  name!: string;

  // Natural key: products reference the slug, not the id
  @Column({ name: 'slug', type: 'varchar', length: 120, unique: true })
  slug!: string;

  @Column({ name: 'icon', type: 'varchar', length: 120, nullable: true })
  icon!: string | null;

  @OneToMany(() => Product, (product) => product.category)
  products?: Product[];

  @Column({
    name: 'created_at',
    type: 'timestamp',
    nullable: true,
    default: () => 'CURRENT_TIMESTAMP',
  })
  createdAt!: Date | null;

  @Column({
    name: 'updated_at',
    type: 'timestamp',
    nullable: true,
    default: () => 'CURRENT_TIMESTAMP',
    onUpdate: 'CURRENT_TIMESTAMP',
  })
  updatedAt!: Date | null;
}
