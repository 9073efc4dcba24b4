import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { Category } from './category.entity';
import { CreateCategoryDto } from './dto/create-category.dto';
import { RenameCategoryDto } from './dto/rename-category.dto';
import { withConstraintErrors } from '../common/errors/database-error.mapper';
import { validateDto } from '../common/utils/validate-dto';
import { WinstonLogger } from '../common/winston.logger';

export type CategoryRow = Pick<Category, 'name' | 'slug' | 'icon'>;

export function toCategoryRow(dto: CreateCategoryDto): CategoryRow {
  return {
    name: dto.name,
    slug: dto.slug,
    icon: dto.icon ?? null,
  };
}

@Injectable()
export class CategoryService {
  private readonly logger = new WinstonLogger(CategoryService.name);

  constructor(
    @InjectRepository(Category)
    private readonly categoryRepository: Repository<Category>,
  ) {}

  findAll() {
    return this.categoryRepository.find({ order: { id: 'ASC' } });
  }

  findBySlug(slug: string) {
    return this.categoryRepository.findOne({ where: { slug } });
  }

  async create(data: CreateCategoryDto): Promise<Category> {
    const dto = await validateDto(CreateCategoryDto, data);
    return withConstraintErrors(`Category "${dto.slug}"`, () =>
      this.categoryRepository.save(this.categoryRepository.create(toCategoryRow(dto))),
    );
  }

  /** Bulk insert inside a caller-owned transaction. */
  async insertMany(manager: EntityManager, rows: CreateCategoryDto[]): Promise<number> {
    if (rows.length === 0) return 0;
    await withConstraintErrors('Category', () =>
      manager.insert(Category, rows.map((row) => toCategoryRow(row))),
    );
    return rows.length;
  }

  /**
   * Changes the natural key. Products follow through ON UPDATE CASCADE,
   * so nothing else is touched here.
   */
  async renameSlug(slug: string, nextSlug: string): Promise<Category> {
    const { slug: validSlug } = await validateDto(RenameCategoryDto, { slug: nextSlug });
    const category = await this.findBySlug(slug);
    if (!category) {
      throw new NotFoundException(`Category "${slug}" not found`);
    }

    await withConstraintErrors(`Category "${validSlug}"`, () =>
      this.categoryRepository.update({ id: category.id }, { slug: validSlug }),
    );
    this.logger.log(`🔁 Category slug renamed ${slug} -> ${validSlug}`);
    return { ...category, slug: validSlug };
  }

  /** Rejected with a ConflictException while products still use the slug. */
  async remove(slug: string): Promise<void> {
    const category = await this.findBySlug(slug);
    if (!category) {
      throw new NotFoundException(`Category "${slug}" not found`);
    }

    await withConstraintErrors(`Category "${slug}"`, () =>
      this.categoryRepository.delete({ id: category.id }),
    );
    this.logger.log(`🗑️ Category ${slug} deleted`);
  }
}
