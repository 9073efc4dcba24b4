import { Module } from '@nestjs/common';
import { CategoryModule } from '../categories/category.module';
import { ProductModule } from '../products/product.module';
import { OrderModule } from '../orders/order.module';
import { SeedService } from './seed.service';

@Module({
  imports: [CategoryModule, ProductModule, OrderModule],
  providers: [SeedService],
  exports: [SeedService],
})
export class SeedModule {}
