import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { Order } from './order.entity';
import { OrderItem } from './order-item.entity';
import { OrderStatus } from './order-status.enum';
import { CreateOrderDto, CreateOrderItemDto } from './dto/create-order.dto';
import { withConstraintErrors } from '../common/errors/database-error.mapper';
import { insertedId } from '../common/utils/insert-result';
import { toMoney } from '../common/utils/money';
import { validateDto } from '../common/utils/validate-dto';
import { WinstonLogger } from '../common/winston.logger';

export type OrderRow = Pick<
  Order,
  | 'buyerName'
  | 'buyerEmail'
  | 'buyerAddress'
  | 'subtotal'
  | 'discount'
  | 'deliveryFee'
  | 'total'
  | 'status'
  | 'couponCode'
>;

export type OrderItemRow = Pick<OrderItem, 'orderId' | 'productId' | 'title' | 'price' | 'quantity' | 'image'>;

export interface CreatedOrder {
  orderId: number;
  itemCount: number;
}

// Amounts are stored as given; the total is not recomputed here
export function toOrderRow(dto: CreateOrderDto): OrderRow {
  return {
    buyerName: dto.buyerName,
    buyerEmail: dto.buyerEmail,
    buyerAddress: dto.buyerAddress,
    subtotal: toMoney(dto.subtotal),
    discount: toMoney(dto.discount),
    deliveryFee: toMoney(dto.deliveryFee),
    total: toMoney(dto.total),
    status: dto.status ?? OrderStatus.PENDING,
    couponCode: dto.couponCode ?? null,
  };
}

export function toOrderItemRow(dto: CreateOrderItemDto, orderId: number): OrderItemRow {
  return {
    orderId,
    productId: dto.productId ?? null,
    title: dto.title,
    price: toMoney(dto.price),
    quantity: dto.quantity,
    image: dto.image ?? null,
  };
}

@Injectable()
export class OrderService {
  private readonly logger = new WinstonLogger(OrderService.name);

  constructor(
    @InjectDataSource()
    private readonly dataSource: DataSource,
    @InjectRepository(Order)
    private readonly orderRepository: Repository<Order>,
  ) {}

  /** Order and items are written together in one transaction. */
  async createWithItems(data: CreateOrderDto): Promise<CreatedOrder> {
    const dto = await validateDto(CreateOrderDto, data);
    const created = await this.dataSource.transaction((manager) => this.insertWithItems(manager, dto));
    this.logger.log(`🧾 Order #${created.orderId} created with ${created.itemCount} item(s)`);
    return created;
  }

  /**
   * Inserts the order, then its items with the id the insert returned.
   * Nothing depends on the session's LAST_INSERT_ID().
   */
  async insertWithItems(manager: EntityManager, dto: CreateOrderDto): Promise<CreatedOrder> {
    const result = await withConstraintErrors('Order', () => manager.insert(Order, toOrderRow(dto)));
    const orderId = insertedId(result);

    if (dto.items.length > 0) {
      await withConstraintErrors(`Items of order #${orderId}`, () =>
        manager.insert(
          OrderItem,
          dto.items.map((item) => toOrderItemRow(item, orderId)),
        ),
      );
    }

    return { orderId, itemCount: dto.items.length };
  }

  findOne(id: number) {
    return this.orderRepository.findOne({
      where: { id },
      relations: { items: true },
      order: { items: { id: 'ASC' } },
    });
  }

  /** Items are removed by ON DELETE CASCADE. */
  async remove(id: number): Promise<void> {
    const result = await this.orderRepository.delete({ id });
    if (!result.affected) {
      throw new NotFoundException(`Order ${id} not found`);
    }
    this.logger.log(`🗑️ Order #${id} deleted`);
  }
}
