import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { DROP_STATEMENTS } from './supermarket.ddl';
import { WinstonLogger } from '../common/winston.logger';

@Injectable()
export class SchemaService {
  private readonly logger = new WinstonLogger(SchemaService.name);

  constructor(
    @InjectDataSource()
    private readonly dataSource: DataSource,
  ) {}

  /** Applies pending migrations in timestamp order, one transaction each. */
  async migrate(): Promise<string[]> {
    const applied = await this.dataSource.runMigrations({ transaction: 'each' });
    const names = applied.map((migration) => migration.name);
    if (names.length === 0) {
      this.logger.log('ℹ️ Schema is up to date, no pending migrations');
    } else {
      names.forEach((name) => this.logger.log(`✅ Migration applied: ${name}`));
    }
    return names;
  }

  async revert(): Promise<void> {
    await this.dataSource.undoLastMigration({ transaction: 'each' });
    this.logger.log('↩️ Last migration reverted');
  }

  /** True when at least one migration has not been applied yet. */
  hasPendingMigrations(): Promise<boolean> {
    return this.dataSource.showMigrations();
  }

  /**
   * Drops the storefront tables and the migration history, then migrates
   * from scratch.
   */
  async reset(): Promise<string[]> {
    this.logger.warn('⚠️ Dropping storefront tables');
    for (const sql of DROP_STATEMENTS) {
      await this.dataSource.query(sql);
    }
    const historyTable = this.dataSource.options.migrationsTableName || 'migrations';
    await this.dataSource.query(`DROP TABLE IF EXISTS \`${historyTable}\``);
    return this.migrate();
  }
}
