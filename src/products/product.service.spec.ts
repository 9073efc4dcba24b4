import { BadRequestException, NotFoundException } from '@nestjs/common';
import { Like, Repository } from 'typeorm';
import { Product } from './product.entity';
import { PRODUCT_LIST_LIMIT, ProductService, toProductRow } from './product.service';
import { Category } from '../categories/category.entity';
import { CategoryService } from '../categories/category.service';
import { InMemoryStorefront } from '../testing/in-memory-storefront';

describe('toProductRow', () => {
  it('fills defaults and leaves rating to the column default', () => {
    expect(toProductRow({ title: 'Roti Tawar', price: '15000', categorySlug: 'bakery' })).toEqual({
      title: 'Roti Tawar',
      description: null,
      price: '15000.00',
      categorySlug: 'bakery',
      inStock: true,
      image: null,
    });
  });

  it('keeps one decimal of rating', () => {
    expect(toProductRow({ title: 'Susu UHT 1L', price: '18000.00', categorySlug: 'dairy', rating: 4 }).rating).toBe('4.0');
    expect(toProductRow({ title: 'Susu UHT 1L', price: '18000.00', categorySlug: 'dairy', rating: null }).rating).toBeNull();
  });
});

describe('ProductService', () => {
  it('filters by category and escaped title fragment', async () => {
    const find = jest.fn().mockResolvedValue([]);
    const service = new ProductService({ find } as unknown as Repository<Product>);

    await service.findAll({ category: 'snacks', q: '100%' });

    expect(find).toHaveBeenCalledWith({
      where: { categorySlug: 'snacks', title: Like('%100\\%%') },
      order: { id: 'ASC' },
      take: PRODUCT_LIST_LIMIT,
    });
  });

  it('lists everything without a filter', async () => {
    const find = jest.fn().mockResolvedValue([]);
    const service = new ProductService({ find } as unknown as Repository<Product>);

    await service.findAll();

    expect(find).toHaveBeenCalledWith({ where: {}, order: { id: 'ASC' }, take: 100 });
  });

  it('returns null for an unknown id', async () => {
    const findOne = jest.fn().mockResolvedValue(null);
    const service = new ProductService({ findOne } as unknown as Repository<Product>);

    await expect(service.findOne(99)).resolves.toBeNull();
    expect(findOne).toHaveBeenCalledWith({ where: { id: 99 } });
  });

  describe('against the storefront tables', () => {
    let store: InMemoryStorefront;
    let service: ProductService;

    beforeEach(async () => {
      store = new InMemoryStorefront();
      service = new ProductService(store.repository<Product>(Product));
      await new CategoryService(store.repository<Category>(Category)).create({ name: 'Snack', slug: 'snacks' });
    });

    it('creates a product in an existing category', async () => {
      const product = await service.create({ title: 'Keripik Kentang 100g', price: '12000.00', categorySlug: 'snacks' });
      expect(product).toMatchObject({ id: 1, categorySlug: 'snacks', price: '12000.00', inStock: true });
    });

    it('rejects an unknown category slug', async () => {
      await expect(
        service.create({ title: 'Roti Tawar', price: '15000.00', categorySlug: 'bakery' }),
      ).rejects.toThrow(new BadRequestException('Product "Roti Tawar" references a row that does not exist'));
      expect(store.rows(Product)).toEqual([]);
    });

    it('rejects a negative price', async () => {
      await expect(
        service.create({ title: 'Keripik', price: '-1.00', categorySlug: 'snacks' }),
      ).rejects.toBeInstanceOf(BadRequestException);
    });

    it('deletes by id', async () => {
      const product = await service.create({ title: 'Keripik Kentang 100g', price: '12000.00', categorySlug: 'snacks' });
      await service.remove(product.id);
      expect(store.rows(Product)).toEqual([]);
      await expect(service.remove(product.id)).rejects.toBeInstanceOf(NotFoundException);
    });
  });
});
