/**
 * MySQL DDL for the storefront schema. Shared by the migration and the
 * import script so both produce the same tables.
 */

/** Creation order. Drops run in reverse. */
export const SUPERMARKET_TABLES = ['categories', 'products', 'orders', 'order_items'] as const;

export type SupermarketTable = (typeof SUPERMARKET_TABLES)[number];

export const SESSION_SETTINGS: readonly string[] = [
  'SET NAMES utf8mb4',
  'SET time_zone = "+00:00"',
  "SET sql_mode = 'NO_AUTO_VALUE_ON_ZERO'",
];

export const DROP_STATEMENTS: readonly string[] = [...SUPERMARKET_TABLES]
  .reverse()
  .map((table) => `DROP TABLE IF EXISTS \`${table}\``);

const TIMESTAMPS = `
  created_at TIMESTAMP NULL DEFAULT CURRENT_TIMESTAMP,
  updated_at TIMESTAMP NULL DEFAULT CURRENT_TIMESTAMP ON UPDATE CURRENT_TIMESTAMP,`;

const TABLE_OPTIONS = 'ENGINE=InnoDB DEFAULT CHARSET=utf8mb4';

export const CREATE_STATEMENTS: Record<SupermarketTable, string> = {
  categories: `CREATE TABLE \`categories\` (
  id INT UNSIGNED NOT NULL AUTO_INCREMENT,
  name VARCHAR(120) NOT NULL,
  slug VARCHAR(120) NOT NULL,
  icon VARCHAR(120) NULL,${TIMESTAMPS}
  PRIMARY KEY (id),
  UNIQUE KEY uq_categories_slug (slug)
) ${TABLE_OPTIONS}`,

  products: `CREATE TABLE \`products\` (
  id INT UNSIGNED NOT NULL AUTO_INCREMENT,
  title VARCHAR(200) NOT NULL,
  description TEXT NULL,
  price DECIMAL(12,2) NOT NULL DEFAULT 0,
  category_slug VARCHAR(120) NOT NULL,
  in_stock TINYINT(1) NOT NULL DEFAULT 1,
  image VARCHAR(500) NULL,
  rating DECIMAL(3,1) NULL DEFAULT 4.5,${TIMESTAMPS}
  PRIMARY KEY (id),
  INDEX idx_category_slug (category_slug),
  CONSTRAINT fk_products_category_slug FOREIGN KEY (category_slug) REFERENCES categories(slug)
    ON UPDATE CASCADE ON DELETE RESTRICT
) ${TABLE_OPTIONS}`,

  orders: `CREATE TABLE \`orders\` (
  id INT UNSIGNED NOT NULL AUTO_INCREMENT,
  buyer_name VARCHAR(160) NOT NULL,
  buyer_email VARCHAR(160) NOT NULL,
  buyer_address TEXT NOT NULL,
  subtotal DECIMAL(12,2) NOT NULL DEFAULT 0,
  discount DECIMAL(12,2) NOT NULL DEFAULT 0,
  delivery_fee DECIMAL(12,2) NOT NULL DEFAULT 0,
  total DECIMAL(12,2) NOT NULL DEFAULT 0,
  status ENUM('pending','paid','shipped','completed','cancelled') NOT NULL DEFAULT 'pending',
  coupon_code VARCHAR(64) NULL,${TIMESTAMPS}
  PRIMARY KEY (id)
) ${TABLE_OPTIONS}`,

  order_items: `CREATE TABLE \`order_items\` (
  id INT UNSIGNED NOT NULL AUTO_INCREMENT,
  order_id INT UNSIGNED NOT NULL,
  product_id VARCHAR(64) NULL,
  title VARCHAR(200) NOT NULL,
  price DECIMAL(12,2) NOT NULL DEFAULT 0,
  quantity INT UNSIGNED NOT NULL DEFAULT 1,
  image VARCHAR(500) NULL,${TIMESTAMPS}
  PRIMARY KEY (id),
  INDEX idx_order_id (order_id),
  CONSTRAINT fk_items_order_id FOREIGN KEY (order_id) REFERENCES orders(id)
    ON UPDATE CASCADE ON DELETE CASCADE
) ${TABLE_OPTIONS}`,
};

export function createStatementsInOrder(): string[] {
  return SUPERMARKET_TABLES.map((table) => CREATE_STATEMENTS[table]);
}
