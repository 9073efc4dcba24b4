import { BadRequestException, ConflictException } from '@nestjs/common';
import { SeedService } from './seed.service';
import { SEED_ORDER, SUPERMARKET_FIXTURE } from './supermarket.seed';
import { Category } from '../categories/category.entity';
import { CategoryService } from '../categories/category.service';
import { Product } from '../products/product.entity';
import { ProductService } from '../products/product.service';
import { Order } from '../orders/order.entity';
import { OrderItem } from '../orders/order-item.entity';
import { OrderService } from '../orders/order.service';
import { InMemoryStorefront } from '../testing/in-memory-storefront';

function createSeedService(store: InMemoryStorefront) {
  const dataSource = store.dataSource();
  const categories = new CategoryService(store.repository<Category>(Category));
  const products = new ProductService(store.repository<Product>(Product));
  const orders = new OrderService(dataSource, store.repository<Order>(Order));
  return { seed: new SeedService(dataSource, categories, products, orders), categories, orders };
}

function tableSizes(store: InMemoryStorefront) {
  return [Category, Product, Order, OrderItem].map((target) => store.rows(target).length);
}

describe('SeedService', () => {
  let store: InMemoryStorefront;
  let service: ReturnType<typeof createSeedService>;

  beforeEach(() => {
    store = new InMemoryStorefront();
    service = createSeedService(store);
  });

  it('loads 4 categories, 5 products, 1 order and 2 items', async () => {
    const summary = await service.seed.run();

    expect(summary).toEqual({ categories: 4, products: 5, orders: 1, orderItems: 2, orderIds: [1] });
    expect(tableSizes(store)).toEqual([4, 5, 1, 2]);
  });

  it('gives the categories distinct slugs and every product an existing one', async () => {
    await service.seed.run();

    const slugs = store.rows(Category).map((row) => row.slug);
    expect(slugs).toEqual(['produce', 'meat', 'dairy', 'snacks']);
    for (const product of store.rows(Product)) {
      expect(slugs).toContain(product.categorySlug);
    }
  });

  it('writes the example order and its snapshot items', async () => {
    await service.seed.run();

    const [order] = store.rows(Order);
    expect(order).toMatchObject({
      buyerName: 'Budi',
      buyerEmail: 'budi@example.com',
      subtotal: '87000.00',
      discount: '8700.00',
      deliveryFee: '15000.00',
      total: '93300.00',
      status: 'pending',
      couponCode: 'HEMAT10',
    });
    expect(
      store.rows(OrderItem).map(({ orderId, productId, title, price, quantity }) => ({
        orderId,
        productId,
        title,
        price,
        quantity,
      })),
    ).toEqual([
      { orderId: order.id, productId: 'mock-apple', title: 'Apel Fuji 1kg', price: '35000.00', quantity: 1 },
      { orderId: order.id, productId: 'mock-chips', title: 'Keripik Kentang 100g', price: '12000.00', quantity: 2 },
    ]);
  });

  it('uses the id of its own order even when others already exist', async () => {
    store.insert(Order, { buyerName: 'Existing', total: '0.00' });

    const summary = await service.seed.run();

    expect(summary?.orderIds).toEqual([2]);
    expect(store.rows(OrderItem).map((item) => item.orderId)).toEqual([2, 2]);
  });

  it('skips when categories already has rows', async () => {
    await service.seed.run();

    await expect(service.seed.run()).resolves.toBeNull();
    expect(tableSizes(store)).toEqual([4, 5, 1, 2]);
  });

  it('fails on duplicate slugs when loaded twice and keeps the first load intact', async () => {
    await service.seed.load(SUPERMARKET_FIXTURE);

    await expect(service.seed.load(SUPERMARKET_FIXTURE)).rejects.toBeInstanceOf(ConflictException);
    expect(tableSizes(store)).toEqual([4, 5, 1, 2]);
  });

  it('rolls everything back when a product names an unknown category', async () => {
    const fixture = {
      ...SUPERMARKET_FIXTURE,
      products: [...SUPERMARKET_FIXTURE.products, { title: 'Roti Tawar', price: '15000.00', categorySlug: 'bakery' }],
    };

    await expect(service.seed.load(fixture)).rejects.toBeInstanceOf(BadRequestException);
    expect(tableSizes(store)).toEqual([0, 0, 0, 0]);
  });

  it('validates the whole fixture before writing', async () => {
    const fixture = {
      ...SUPERMARKET_FIXTURE,
      orders: [{ ...SEED_ORDER, buyerEmail: 'not-an-email' }],
    };

    await expect(service.seed.load(fixture)).rejects.toBeInstanceOf(BadRequestException);
    expect(tableSizes(store)).toEqual([0, 0, 0, 0]);
  });

  it('supports the integrity rules on seeded data', async () => {
    await service.seed.run();

    await expect(service.categories.remove('produce')).rejects.toBeInstanceOf(ConflictException);
    await service.categories.create({ name: 'Roti', slug: 'bakery' });
    await service.categories.remove('bakery');

    await service.orders.remove(1);
    expect(tableSizes(store)).toEqual([4, 5, 0, 0]);
  });
});
