import { Injectable } from '@nestjs/common';
import { format } from 'mysql2';
import { createStatementsInOrder, DROP_STATEMENTS, SESSION_SETTINGS } from './supermarket.ddl';
import { SeedFixture, SUPERMARKET_FIXTURE } from '../seed/supermarket.seed';
import { toMoney } from '../common/utils/money';
import { toCategoryRow } from '../categories/category.service';
import { toProductRow } from '../products/product.service';
import { toOrderRow } from '../orders/order.service';

type SqlValue = string | number | boolean | null;

const ORDER_ID_VARIABLE = '@seed_order_id';

function insertStatement(table: string, columns: string[], rows: SqlValue[][]): string {
  const head = format('INSERT INTO ?? (??) VALUES', [table, columns]);
  const values = rows.map((row) => `  ${format('(?)', [row])}`).join(',\n');
  return `${head}\n${values};`;
}

/**
 * Renders schema and seed as one MySQL script, the form an admin tool
 * (phpMyAdmin, mysql CLI) imports in a single session.
 */
@Injectable()
export class ImportScriptService {
  render(fixture: SeedFixture = SUPERMARKET_FIXTURE): string {
    const sections: string[] = [
      '-- Supermarket schema and seed (MySQL/MariaDB)',
      SESSION_SETTINGS.map((sql) => `${sql};`).join('\n'),
      DROP_STATEMENTS.map((sql) => `${sql};`).join('\n'),
      ...createStatementsInOrder().map((sql) => `${sql};`),
    ];

    if (fixture.categories.length > 0) {
      sections.push(
        insertStatement(
          'categories',
          ['name', 'slug', 'icon'],
          fixture.categories.map(toCategoryRow).map((row) => [row.name, row.slug, row.icon]),
        ),
      );
    }

    if (fixture.products.length > 0) {
      sections.push(
        insertStatement(
          'products',
          ['title', 'description', 'price', 'category_slug', 'in_stock', 'image', 'rating'],
          fixture.products.map(toProductRow).map((row) => [
            row.title,
            row.description,
            row.price,
            row.categorySlug,
            row.inStock ? 1 : 0,
            row.image,
            row.rating === undefined ? 4.5 : row.rating,
          ]),
        ),
      );
    }

    for (const order of fixture.orders) {
      const row = toOrderRow(order);
      const statements = [
        insertStatement(
          'orders',
          ['buyer_name', 'buyer_email', 'buyer_address', 'subtotal', 'discount', 'delivery_fee', 'total', 'status', 'coupon_code'],
          [[row.buyerName, row.buyerEmail, row.buyerAddress, row.subtotal, row.discount, row.deliveryFee, row.total, row.status, row.couponCode]],
        ),
        // captured right away so the items never pick up another insert's id
        `SET ${ORDER_ID_VARIABLE} = LAST_INSERT_ID();`,
      ];

      if (order.items.length > 0) {
        const head = format('INSERT INTO ?? (??) VALUES', [
          'order_items',
          ['order_id', 'product_id', 'title', 'price', 'quantity', 'image'],
        ]);
        const values = order.items
          .map((item) =>
            format(`  (${ORDER_ID_VARIABLE}, ?, ?, ?, ?, ?)`, [
              item.productId ?? null,
              item.title,
              toMoney(item.price),
              item.quantity,
              item.image ?? null,
            ]),
          )
          .join(',\n');
        statements.push(`${head}\n${values};`);
      }
      sections.push(statements.join('\n'));
    }

    return `${sections.join('\n\n')}\n`;
  }
}
