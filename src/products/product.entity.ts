import { ApiProperty } from '@nestjs/swagger';
import type { SortDirection } from '../database/database.service';

export interface Product {
  id: number;
  name: string;
  price: number;
  description: string | null;
  quantity: number;
  created_by: string | null;
  created_at: Date;
  updated_at: Date;
}

export type NewProduct = Pick<Product, 'name' | 'price' | 'description' | 'quantity' | 'created_by'>;

export type ProductPatch = Partial<Pick<Product, 'name' | 'price' | 'description' | 'quantity'>>;

// Column limits: price is DECIMAL(12,2), quantity INT UNSIGNED.
export const MAX_PRICE = 9999999999.99;
export const MAX_QUANTITY = 4294967295;

export const PRODUCT_SORT_FIELDS = ['id', 'name', 'price', 'created_at'] as const;
export type ProductSortField = (typeof PRODUCT_SORT_FIELDS)[number];

export interface ProductSort {
  field: ProductSortField;
  order: SortDirection;
}

// Swagger schema representation
export class ProductResponseDto implements Product {
  @ApiProperty({ description: 'Product id', example: 1 })
  id!: number;

  @ApiProperty({ description: 'Product name', example: 'Desk lamp' })
  name!: string;

  @ApiProperty({ description: 'Unit price', example: 39.9 })
  price!: number;

  @ApiProperty({ description: 'Free-form description', example: 'LED, warm white', nullable: true, type: String })
  description!: string | null;

  @ApiProperty({ description: 'Units in stock', example: 12 })
  quantity!: number;

  @ApiProperty({ description: 'Username of the admin who created it', example: 'bob', nullable: true, type: String })
  created_by!: string | null;

  @ApiProperty({ description: 'Creation timestamp', example: '2026-01-19T00:00:00.000Z', format: 'date-time' })
  created_at!: Date;

  @ApiProperty({ description: 'Last update timestamp', example: '2026-01-19T00:00:00.000Z', format: 'date-time' })
  updated_at!: Date;
}
