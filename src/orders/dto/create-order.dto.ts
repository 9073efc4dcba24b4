import { Type } from 'class-transformer';
import {
  IsArray,
  IsEmail,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { IsMoney } from '../../common/utils/is-money.decorator';
import { OrderStatus } from '../order-status.enum';

export class CreateOrderItemDto {
  // Free-text snapshot reference, not checked against products
  @IsOptional()
  @IsString()
  @MaxLength(64)
  productId?: string | null;

  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  title!: string;

  @IsMoney()
  price!: string;

  @IsInt()
  @Min(1)
  quantity!: number;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  image?: string | null;
}

export class CreateOrderDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(160)
  buyerName!: string;

  @IsEmail()
  @MaxLength(160)
  buyerEmail!: string;

  @IsString()
  @IsNotEmpty()
  buyerAddress!: string;

  @IsMoney()
  subtotal!: string;

  @IsMoney()
  discount!: string;

  @IsMoney()
  deliveryFee!: string;

  @IsMoney()
  total!: string;

  @IsOptional()
  @IsEnum(OrderStatus)
  status?: OrderStatus;

  @IsOptional()
  @IsString()
  @MaxLength(64)
  couponCode?: string | null;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CreateOrderItemDto)
  items!: CreateOrderItemDto[];
}
