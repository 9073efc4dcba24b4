import { DataSource } from 'typeorm';
import { SchemaService } from './schema.service';
import { DROP_STATEMENTS } from './supermarket.ddl';

function fakeDataSource() {
  const queries: string[] = [];
  const dataSource = {
    options: { migrationsTableName: 'schema_migrations' },
    query: jest.fn(async (sql: string) => {
      queries.push(sql);
      return [];
    }),
    runMigrations: jest.fn(async () => [{ name: 'CreateSupermarketSchema1730419200000' }]),
    undoLastMigration: jest.fn(async () => undefined),
    showMigrations: jest.fn(async () => true),
  };
  return { queries, dataSource, service: new SchemaService(dataSource as unknown as DataSource) };
}

describe('SchemaService', () => {
  it('runs migrations one transaction each', async () => {
    const { dataSource, service } = fakeDataSource();
    await expect(service.migrate()).resolves.toEqual(['CreateSupermarketSchema1730419200000']);
    expect(dataSource.runMigrations).toHaveBeenCalledWith({ transaction: 'each' });
  });

  it('drops the tables and the migration history before migrating again', async () => {
    const { dataSource, queries, service } = fakeDataSource();
    await service.reset();
    expect(queries).toEqual([...DROP_STATEMENTS, 'DROP TABLE IF EXISTS `schema_migrations`']);
    expect(dataSource.runMigrations).toHaveBeenCalledTimes(1);
  });

  it('reverts the last migration', async () => {
    const { dataSource, service } = fakeDataSource();
    await service.revert();
    expect(dataSource.undoLastMigration).toHaveBeenCalledWith({ transaction: 'each' });
  });

  it('reports pending migrations', async () => {
    await expect(fakeDataSource().service.hasPendingMigrations()).resolves.toBe(true);
  });
});
