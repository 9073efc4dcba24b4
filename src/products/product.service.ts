import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, FindOptionsWhere, Like, Repository } from 'typeorm';
import { Product } from './product.entity';
import { CreateProductDto } from './dto/create-product.dto';
import { withConstraintErrors } from '../common/errors/database-error.mapper';
import { validateDto } from '../common/utils/validate-dto';
import { toMoney } from '../common/utils/money';

export const PRODUCT_LIST_LIMIT = 100;

export type ProductRow = Pick<Product, 'title' | 'description' | 'price' | 'categorySlug' | 'inStock' | 'image'> & {
  rating?: string | null;
};

export function toProductRow(dto: CreateProductDto): ProductRow {
  const row: ProductRow = {
    title: dto.title,
    description: dto.description ?? null,
    price: toMoney(dto.price),
    categorySlug: dto.categorySlug,
    inStock: dto.inStock ?? true,
    image: dto.image ?? null,
  };
  // left out entirely so the column default (4.5) applies
  if (dto.rating !== undefined) {
    row.rating = dto.rating === null ? null : dto.rating.toFixed(1);
  }
  return row;
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

@Injectable()
export class ProductService {
  constructor(
    @InjectRepository(Product)
    private readonly productRepository: Repository<Product>,
  ) {}

  /**
   * Lists products, optionally by category slug and by title fragment.
   * Title matching follows the column collation (case-insensitive).
   */
  findAll(filter?: { category?: string; q?: string }) {
    const where: FindOptionsWhere<Product> = {};
    if (filter?.category) {
      where.categorySlug = filter.category;
    }
    if (filter?.q) {
      where.title = Like(`%${escapeLike(filter.q)}%`);
    }

    return this.productRepository.find({
      where,
      order: { id: 'ASC' },
      take: PRODUCT_LIST_LIMIT,
    });
  }

  findOne(id: number) {
    return this.productRepository.findOne({ where: { id } });
  }

  /** Fails with BadRequestException when the category slug does not exist. */
  async create(data: CreateProductDto): Promise<Product> {
    const dto = await validateDto(CreateProductDto, data);
    return withConstraintErrors(`Product "${dto.title}"`, () =>
      this.productRepository.save(this.productRepository.create(toProductRow(dto))),
    );
  }

  async insertMany(manager: EntityManager, rows: CreateProductDto[]): Promise<number> {
    if (rows.length === 0) return 0;
    await withConstraintErrors('Product', () =>
      manager.insert(Product, rows.map((row) => toProductRow(row))),
    );
    return rows.length;
  }

  async remove(id: number): Promise<void> {
    const result = await this.productRepository.delete({ id });
    if (!result.affected) {
      throw new NotFoundException(`Product ${id} not found`);
    }
  }
}
