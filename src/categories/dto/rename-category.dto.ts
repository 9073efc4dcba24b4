import { MaxLength } from 'class-validator';
import { IsUrlSafeSlug } from '../../common/utils/slug';

export class RenameCategoryDto {
  @IsUrlSafeSlug()
  @MaxLength(120)
  slug!: string;
}
