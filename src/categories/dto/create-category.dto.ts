import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { IsUrlSafeSlug } from '../../common/utils/slug';

export class CreateCategoryDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(120)
  name!: string;

  @IsUrlSafeSlug()
  @MaxLength(120)
  slug!: string;

  @IsOptional()
  @IsString()
  @MaxLength(120)
  icon?: string | null;
}
