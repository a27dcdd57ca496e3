import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsInt, IsNotEmpty, IsNumber, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import type { SortDirection } from '../database/database.service';
import { MAX_PRICE, MAX_QUANTITY, PRODUCT_SORT_FIELDS, ProductSortField } from './product.entity';

const SORT_DIRECTIONS: readonly SortDirection[] = ['asc', 'desc'];

export class CreateProductDto {
  @ApiProperty({ description: 'Product name', example: 'Desk lamp', maxLength: 255 })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @ApiProperty({ description: 'Unit price, 0 or more, two decimals at most', example: 39.9, minimum: 0, maximum: MAX_PRICE })
  @IsNumber({ allowNaN: false, allowInfinity: false, maxDecimalPlaces: 2 })
  @Min(0)
  @Max(MAX_PRICE)
  price!: number;

  @ApiPropertyOptional({ description: 'Free-form description', example: 'LED, warm white', nullable: true, type: String })
  @IsString()
  @IsOptional()
  description?: string | null;

  @ApiPropertyOptional({ description: 'Units in stock', example: 12, minimum: 0, maximum: MAX_QUANTITY, default: 0 })
  @IsInt()
  @Min(0)
  @Max(MAX_QUANTITY)
  @IsOptional()
  quantity?: number;
}

// Same rules with every field optional. PATCH sends this as a partial update.
export class UpdateProductDto {
  @ApiPropertyOptional({ description: 'Product name', example: 'Desk lamp', maxLength: 255 })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  @IsOptional()
  name?: string;

  @ApiPropertyOptional({ description: 'Unit price, 0 or more, two decimals at most', example: 42, minimum: 0, maximum: MAX_PRICE })
  @IsNumber({ allowNaN: false, allowInfinity: false, maxDecimalPlaces: 2 })
  @Min(0)
  @Max(MAX_PRICE)
  @IsOptional()
  price?: number;

  @ApiPropertyOptional({ description: 'Free-form description (null clears it)', nullable: true, type: String })
  @IsString()
  @IsOptional()
  description?: string | null;

  @ApiPropertyOptional({ description: 'Units in stock', example: 3, minimum: 0, maximum: MAX_QUANTITY })
  @IsInt()
  @Min(0)
  @Max(MAX_QUANTITY)
  @IsOptional()
  quantity?: number;
}

export class ListProductsQueryDto {
  @ApiPropertyOptional({ description: 'Sort field', enum: [...PRODUCT_SORT_FIELDS] })
  @IsIn(PRODUCT_SORT_FIELDS)
  @IsOptional()
  sort?: ProductSortField;

  @ApiPropertyOptional({ description: 'Sort direction (with sort)', enum: [...SORT_DIRECTIONS], default: 'asc' })
  @IsIn(SORT_DIRECTIONS)
  @IsOptional()
  order?: SortDirection;
}
