import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { Category } from '../categories/category.entity';
import { CategoryService } from '../categories/category.service';
import { CreateCategoryDto } from '../categories/dto/create-category.dto';
import { ProductService } from '../products/product.service';
import { CreateProductDto } from '../products/dto/create-product.dto';
import { OrderService } from '../orders/order.service';
import { CreateOrderDto } from '../orders/dto/create-order.dto';
import { validateDto } from '../common/utils/validate-dto';
import { WinstonLogger } from '../common/winston.logger';
import { SeedFixture, SUPERMARKET_FIXTURE } from './supermarket.seed';

export interface SeedSummary {
  categories: number;
  products: number;
  orders: number;
  orderItems: number;
  orderIds: number[];
}

@Injectable()
export class SeedService {
  private readonly logger = new WinstonLogger(SeedService.name);

  constructor(
    @InjectDataSource()
    private readonly dataSource: DataSource,
    private readonly categoryService: CategoryService,
    private readonly productService: ProductService,
    private readonly orderService: OrderService,
  ) {}

  /**
   * Loads the fixture into an empty schema. Skipped when categories already
   * has rows, since the slugs would collide.
   */
  async run(fixture: SeedFixture = SUPERMARKET_FIXTURE): Promise<SeedSummary | null> {
    const existing = await this.dataSource.getRepository(Category).count();
    if (existing > 0) {
      this.logger.warn(`⚠️ Seeder skipped - categories already has ${existing} row(s)`);
      return null;
    }
    return this.load(fixture);
  }

  /** Validates every row first, then writes all of them in one transaction. */
  async load(fixture: SeedFixture): Promise<SeedSummary> {
    const categories = await Promise.all(fixture.categories.map((row) => validateDto(CreateCategoryDto, row)));
    const products = await Promise.all(fixture.products.map((row) => validateDto(CreateProductDto, row)));
    const orders = await Promise.all(fixture.orders.map((row) => validateDto(CreateOrderDto, row)));

    const summary = await this.dataSource.transaction(async (manager) => {
      const result: SeedSummary = {
        categories: await this.categoryService.insertMany(manager, categories),
        products: await this.productService.insertMany(manager, products),
        orders: 0,
        orderItems: 0,
        orderIds: [],
      };

      // one order at a time: each item batch needs its own order's id
      for (const order of orders) {
        const created = await this.orderService.insertWithItems(manager, order);
        result.orders += 1;
        result.orderItems += created.itemCount;
        result.orderIds.push(created.orderId);
      }
      return result;
    });

    this.logger.log(
      `✅ Seeder: ${summary.categories} categories, ${summary.products} products, ` +
        `${summary.orders} order(s), ${summary.orderItems} order item(s)`,
    );
    return summary;
  }
}
