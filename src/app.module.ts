import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { buildTypeOrmConfig, DATABASE_ENV_KEYS } from './config/typeorm.config';
import { CategoryModule } from './categories/category.module';
import { ProductModule } from './products/product.module';
import { OrderModule } from './orders/order.module';
import { SchemaModule } from './schema/schema.module';
import { SeedModule } from './seed/seed.module';
import { IntegrityModule } from './integrity/integrity.module';
import { CliService } from './cli/cli.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        ...buildTypeOrmConfig(
          Object.fromEntries(DATABASE_ENV_KEYS.map((key) => [key, config.get<string>(key)])),
        ),
        retryAttempts: 3,
        retryDelay: 2000,
      }),
    }),
    CategoryModule,
    ProductModule,
    OrderModule,
    SchemaModule,
    SeedModule,
    IntegrityModule,
  ],
  providers: [CliService],
})
export class AppModule {}
