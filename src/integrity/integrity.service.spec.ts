import { DataSource } from 'typeorm';
import { INTEGRITY_QUERIES, IntegrityService } from './integrity.service';

type QueryName = keyof typeof INTEGRITY_QUERIES;

const seededRows: Record<QueryName, unknown[]> = {
  counts: [{ categories: '4', products: '5', orders: '1', order_items: '2' }],
  duplicateSlugs: [],
  orphanProducts: [],
  orphanItems: [],
  invalidStatuses: [],
  invalidQuantities: [],
  negativeAmounts: [],
  orderTotals: [{ id: 1, subtotal: '87000.00', discount: '8700.00', delivery_fee: '15000.00', total: '93300.00' }],
};

function auditWith(overrides: Partial<Record<QueryName, unknown[]>>) {
  const rows = { ...seededRows, ...overrides };
  const query = jest.fn(async (sql: string) => {
    const name = (Object.keys(INTEGRITY_QUERIES) as QueryName[]).find((key) => INTEGRITY_QUERIES[key] === sql);
    if (!name) throw new Error(`unexpected query: ${sql}`);
    return rows[name];
  });
  return new IntegrityService({ query } as unknown as DataSource).audit();
}

describe('IntegrityService', () => {
  it('passes on the seeded data', async () => {
    await expect(auditWith({})).resolves.toEqual({
      ok: true,
      counts: { categories: 4, products: 5, orders: 1, order_items: 2 },
      violations: [],
      warnings: [],
    });
  });

  it('reports duplicate slugs and orphans as violations', async () => {
    const report = await auditWith({
      duplicateSlugs: [{ slug: 'produce', occurrences: '2' }],
      orphanProducts: [{ id: 9, category_slug: 'bakery' }],
      orphanItems: [{ id: 3, order_id: 7 }],
    });

    expect(report.ok).toBe(false);
    expect(report.violations).toEqual([
      { check: 'unique-category-slug', message: 'slug "produce" is used by 2 categories' },
      { check: 'product-category', message: 'product #9 references missing category "bakery"' },
      { check: 'order-item-order', message: 'order item #3 references missing order #7' },
    ]);
  });

  it('reports bad statuses, quantities and amounts', async () => {
    const report = await auditWith({
      invalidStatuses: [{ id: 1, status: '' }],
      invalidQuantities: [{ id: 2, quantity: 0 }],
      negativeAmounts: [{ table_name: 'products', id: 5 }],
    });

    expect(report.violations.map((issue) => issue.message)).toEqual([
      'order #1 has unknown status ""',
      'order item #2 has quantity 0',
      'products #5 has a negative amount',
    ]);
  });

  it('only warns when a total does not add up', async () => {
    const report = await auditWith({
      orderTotals: [{ id: 1, subtotal: '87000.00', discount: '8700.00', delivery_fee: '15000.00', total: '87000.00' }],
    });

    expect(report.ok).toBe(true);
    expect(report.warnings).toEqual([
      {
        check: 'order-total',
        message: 'order #1 total 87000.00 differs from subtotal - discount + delivery_fee = 93300.00',
      },
    ]);
  });

  it('lists only the five statuses as valid', () => {
    expect(INTEGRITY_QUERIES.invalidStatuses).toBe(
      "SELECT id, status FROM orders WHERE status NOT IN ('pending', 'paid', 'shipped', 'completed', 'cancelled')",
    );
  });
});
