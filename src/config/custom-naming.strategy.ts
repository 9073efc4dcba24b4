import { DefaultNamingStrategy, Table } from 'typeorm';
import { snakeCase } from 'typeorm/util/StringUtils';

/**
 * Tables, columns, indexes and foreign keys carry explicit names on the
 * entities; only the generated unique key name (`slug: { unique: true }`) is
 * left to the strategy, and it must match `uq_categories_slug` in the DDL.
 */
export class CustomNamingStrategy extends DefaultNamingStrategy {
  uniqueConstraintName(tableOrName: Table | string, columnNames: string[]): string {
    const name = typeof tableOrName === 'string' ? tableOrName : tableOrName.name;
    // "database.table" -> "table"
    const table = name.split('.').pop() ?? name;
    return `uq_${snakeCase(table)}_${columnNames.map((column) => snakeCase(column)).join('_')}`;
  }
}
