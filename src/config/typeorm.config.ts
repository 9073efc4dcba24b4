import { config } from 'dotenv';
import { MysqlConnectionOptions } from 'typeorm/driver/mysql/MysqlConnectionOptions';
import { CustomNamingStrategy } from './custom-naming.strategy';
import { Category } from '../categories/category.entity';
import { Product } from '../products/product.entity';
import { Order } from '../orders/order.entity';
import { OrderItem } from '../orders/order-item.entity';
import { CreateSupermarketSchema1730419200000 } from '../migrations/1730419200000-CreateSupermarketSchema';

config();

export const SUPERMARKET_ENTITIES = [Category, Product, Order, OrderItem];

export const DATABASE_ENV_KEYS = ['DB_HOST', 'DB_PORT', 'DB_USERNAME', 'DB_PASSWORD', 'DB_NAME', 'DB_LOGGING'] as const;

export interface DatabaseEnv {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  logging: boolean;
}

export function readDatabaseEnv(env: NodeJS.ProcessEnv = process.env): DatabaseEnv {
  const port = +(env.DB_PORT || 3306);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`DB_PORT must be a TCP port, got "${env.DB_PORT}"`);
  }

  return {
    host: env.DB_HOST || 'localhost',
    port,
    username: env.DB_USERNAME || 'root',
    password: env.DB_PASSWORD || '',
    database: env.DB_NAME || 'supermarket',
    logging: (env.DB_LOGGING || '').toLowerCase() === 'true',
  };
}

export function buildTypeOrmConfig(env: NodeJS.ProcessEnv = process.env): MysqlConnectionOptions {
  const db = readDatabaseEnv(env);

  return {
    type: 'mysql',
    host: db.host,
    port: db.port,
    username: db.username,
    password: db.password,
    database: db.database,
    entities: SUPERMARKET_ENTITIES,
    migrations: [CreateSupermarketSchema1730419200000],
    migrationsTableName: 'schema_migrations',
    migrationsTransactionMode: 'each',
    namingStrategy: new CustomNamingStrategy(),
    // the schema belongs to the migrations, never to entity sync
    synchronize: false,
    charset: 'utf8mb4_unicode_ci',
    timezone: 'Z',
    logging: db.logging,
    maxQueryExecutionTime: 10000,
    extra: {
      connectionLimit: 5,
      waitForConnections: true,
      queueLimit: 0,
      // DECIMAL columns stay strings
      supportBigNumbers: true,
      bigNumberStrings: true,
      decimalNumbers: false,
      multipleStatements: false,
    },
  };
}
