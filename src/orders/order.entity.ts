import { Entity, PrimaryGeneratedColumn, Column, OneToMany } from 'typeorm';
import { OrderItem } from './order-item.entity';
import { OrderStatus } from './order-status.enum';

const money = { type: 'decimal', precision: 12, scale: 2, default: 0 } as const;

@Entity('orders')
export class Order {
  @PrimaryGeneratedColumn({ type: 'int', unsigned: true })
  id!: number;

  @Column({ name: 'buyer_name', type: 'varchar', length: 160 })
  buyerName!: string;

  @Column({ name: 'buyer_email', type: 'varchar', length: 160 })
  buyerEmail!: string;

  @Column({ name: 'buyer_address', type: 'text' })
  buyerAddress!: string;

  @Column({ name: 'subtotal', ...money })
  subtotal!: string;

  @Column({ name: 'discount', ...money })
  discount!: string;

  @Column({ name: 'delivery_fee', ...money })
  deliveryFee!: string;

  // Not checked against subtotal - discount + delivery_fee by the database
  @Column({ name: 'total', ...money })
  total!: string;

  // Any value swap is legal at this layer, transitions are not guarded
  @Column({
    name: 'status',
    type: 'enum',
    enum: OrderStatus,
    default: OrderStatus.PENDING,
  })
  status!: OrderStatus;

  @Column({ name: 'coupon_code', type: 'varchar', length: 64, nullable: true })
  couponCode!: string | null;

  @OneToMany(() => OrderItem, (item) => item.order)
  items?: OrderItem[];

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
