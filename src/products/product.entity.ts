import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Index } from 'typeorm';
import { Category } from '../categories/category.entity';

@Entity({ name: 'products' })
export class Product {
  @PrimaryGeneratedColumn({ type: 'int', unsigned: true })
  id!: number;

  @Column({ name: 'title', type: 'varchar', length: 200 })
  title!: string;

  @Column({ name: 'description', type: 'text', nullable: true })
  description!: string | null;

  /** DECIMAL(12,2), kept as a string such as "35000.00". */
  @Column({ name: 'price', type: 'decimal', precision: 12, scale: 2, default: 0 })
  price!: string;

  @Index('idx_category_slug')
  @Column({ name: 'category_slug', type: 'varchar', length: 120 })
  categorySlug!: string;

  // Renaming a slug cascades here; a category with products cannot be deleted
  @ManyToOne(() => Category, (category: Category) => category.products, {
    nullable: false,
    onUpdate: 'CASCADE',
    onDelete: 'RESTRICT',
  })
  @JoinColumn({
    name: 'category_slug',
    referencedColumnName: 'slug',
    foreignKeyConstraintName: 'fk_products_category_slug',
  })
  category?: Category;

  // TINYINT(1) in MySQL
  @Column({ name: 'in_stock', type: 'boolean', default: true })
  inStock!: boolean;

  @Column({ name: 'image', type: 'varchar', length: 500, nullable: true })
  image!: string | null;

  @Column({
    name: 'rating',
    type: 'decimal',
    precision: 3,
    scale: 1,
    nullable: true,
    default: 4.5,
  })
  rating!: string | null;

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
