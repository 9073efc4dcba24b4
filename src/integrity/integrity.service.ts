import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { ORDER_STATUSES } from '../orders/order-status.enum';
import { SupermarketTable } from '../schema/supermarket.ddl';
import { expectedOrderTotal, toCents } from '../common/utils/money';
import { WinstonLogger } from '../common/winston.logger';

export interface IntegrityIssue {
  check: string;
  message: string;
}

export interface IntegrityReport {
  ok: boolean;
  counts: Record<SupermarketTable, number>;
  violations: IntegrityIssue[];
  warnings: IntegrityIssue[];
}

const statusList = ORDER_STATUSES.map((status) => `'${status}'`).join(', ');

export const INTEGRITY_QUERIES = {
  counts: `SELECT
  (SELECT COUNT(*) FROM categories) AS categories,
  (SELECT COUNT(*) FROM products) AS products,
  (SELECT COUNT(*) FROM orders) AS orders,
  (SELECT COUNT(*) FROM order_items) AS order_items`,
  duplicateSlugs: 'SELECT slug, COUNT(*) AS occurrences FROM categories GROUP BY slug HAVING COUNT(*) > 1',
  orphanProducts: `SELECT p.id, p.category_slug FROM products p
  LEFT JOIN categories c ON c.slug = p.category_slug WHERE c.id IS NULL`,
  orphanItems: `SELECT i.id, i.order_id FROM order_items i
  LEFT JOIN orders o ON o.id = i.order_id WHERE o.id IS NULL`,
  invalidStatuses: `SELECT id, status FROM orders WHERE status NOT IN (${statusList})`,
  invalidQuantities: 'SELECT id, quantity FROM order_items WHERE quantity < 1',
  negativeAmounts: `SELECT 'products' AS table_name, id FROM products WHERE price < 0
  UNION ALL SELECT 'order_items', id FROM order_items WHERE price < 0
  UNION ALL SELECT 'orders', id FROM orders WHERE subtotal < 0 OR discount < 0 OR delivery_fee < 0 OR total < 0`,
  orderTotals: 'SELECT id, subtotal, discount, delivery_fee, total FROM orders ORDER BY id',
} as const;

interface CountsRow {
  categories: string | number;
  products: string | number;
  orders: string | number;
  order_items: string | number;
}

interface OrderTotalsRow {
  id: number;
  subtotal: string;
  discount: string;
  delivery_fee: string;
  total: string;
}

/**
 * Read-only audit of a live database. Violations are states the schema should
 * have prevented; warnings are rules the schema deliberately leaves to the
 * application (order totals).
 */
@Injectable()
export class IntegrityService {
  private readonly logger = new WinstonLogger(IntegrityService.name);

  constructor(
    @InjectDataSource()
    private readonly dataSource: DataSource,
  ) {}

  async audit(): Promise<IntegrityReport> {
    const violations: IntegrityIssue[] = [];
    const warnings: IntegrityIssue[] = [];

    const countRows: CountsRow[] = await this.dataSource.query(INTEGRITY_QUERIES.counts);
    const countsRow: CountsRow | undefined = countRows[0];
    const counts: Record<SupermarketTable, number> = {
      categories: Number(countsRow?.categories ?? 0),
      products: Number(countsRow?.products ?? 0),
      orders: Number(countsRow?.orders ?? 0),
      order_items: Number(countsRow?.order_items ?? 0),
    };

    const duplicates: { slug: string; occurrences: string | number }[] = await this.dataSource.query(
      INTEGRITY_QUERIES.duplicateSlugs,
    );
    for (const row of duplicates) {
      violations.push({
        check: 'unique-category-slug',
        message: `slug "${row.slug}" is used by ${Number(row.occurrences)} categories`,
      });
    }

    const orphanProducts: { id: number; category_slug: string }[] = await this.dataSource.query(
      INTEGRITY_QUERIES.orphanProducts,
    );
    for (const row of orphanProducts) {
      violations.push({
        check: 'product-category',
        message: `product #${row.id} references missing category "${row.category_slug}"`,
      });
    }

    const orphanItems: { id: number; order_id: number }[] = await this.dataSource.query(INTEGRITY_QUERIES.orphanItems);
    for (const row of orphanItems) {
      violations.push({
        check: 'order-item-order',
        message: `order item #${row.id} references missing order #${row.order_id}`,
      });
    }

    const badStatuses: { id: number; status: string }[] = await this.dataSource.query(INTEGRITY_QUERIES.invalidStatuses);
    for (const row of badStatuses) {
      violations.push({
        check: 'order-status',
        message: `order #${row.id} has unknown status "${row.status}"`,
      });
    }

    const badQuantities: { id: number; quantity: number }[] = await this.dataSource.query(
      INTEGRITY_QUERIES.invalidQuantities,
    );
    for (const row of badQuantities) {
      violations.push({
        check: 'order-item-quantity',
        message: `order item #${row.id} has quantity ${row.quantity}`,
      });
    }

    const negatives: { table_name: string; id: number }[] = await this.dataSource.query(
      INTEGRITY_QUERIES.negativeAmounts,
    );
    for (const row of negatives) {
      violations.push({
        check: 'non-negative-amount',
        message: `${row.table_name} #${row.id} has a negative amount`,
      });
    }

    const totals: OrderTotalsRow[] = await this.dataSource.query(INTEGRITY_QUERIES.orderTotals);
    for (const row of totals) {
      const expected = expectedOrderTotal({
        subtotal: row.subtotal,
        discount: row.discount,
        deliveryFee: row.delivery_fee,
      });
      if (toCents(expected) !== toCents(row.total)) {
        warnings.push({
          check: 'order-total',
          message: `order #${row.id} total ${row.total} differs from subtotal - discount + delivery_fee = ${expected}`,
        });
      }
    }

    const report: IntegrityReport = { ok: violations.length === 0, counts, violations, warnings };
    if (report.ok) {
      this.logger.log(`✅ Integrity audit passed (${warnings.length} warning(s))`);
    } else {
      this.logger.warn(`❌ Integrity audit found ${violations.length} violation(s)`);
    }
    return report;
  }
}
