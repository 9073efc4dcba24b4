import { MigrationInterface, QueryRunner } from 'typeorm';
import { createStatementsInOrder, DROP_STATEMENTS } from '../schema/supermarket.ddl';

export class CreateSupermarketSchema1730419200000 implements MigrationInterface {
  name = 'CreateSupermarketSchema1730419200000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    // Import-safe: leftovers from a manual import are replaced
    for (const sql of DROP_STATEMENTS) {
      await queryRunner.query(sql);
    }
    for (const sql of createStatementsInOrder()) {
      await queryRunner.query(sql);
    }
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    for (const sql of DROP_STATEMENTS) {
      await queryRunner.query(sql);
    }
  }
}
