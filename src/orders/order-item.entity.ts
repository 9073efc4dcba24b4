import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Index } from 'typeorm';
import { Order } from './order.entity';

/**
 * A line of an order. Title, price and image are copied at purchase time and
 * `productId` is a free-text reference, so the row outlives catalog changes.
 */
@Entity('order_items')
export class OrderItem {
  @PrimaryGeneratedColumn({ type: 'int', unsigned: true })
  id!: number;

  @ManyToOne(() => Order, (order) => order.items, {
    nullable: false,
    onUpdate: 'CASCADE',
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'order_id', foreignKeyConstraintName: 'fk_items_order_id' })
  order?: Order;

  @Index('idx_order_id')
  @Column({ name: 'order_id', type: 'int', unsigned: true })
  orderId!: number;

  @Column({ name: 'product_id', type: 'varchar', length: 64, nullable: true })
  productId!: string | null;

  @Column({ name: 'title', type: 'varchar', length: 200 })
  title!: string;

  @Column({ name: 'price', type: 'decimal', precision: 12, scale: 2, default: 0 })
  price!: string;

  @Column({ name: 'quantity', type: 'int', unsigned: true, default: 1 })
  quantity!: number;

  @Column({ name: 'image', type: 'varchar', length: 500, nullable: true })
  image!: string | null;

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
