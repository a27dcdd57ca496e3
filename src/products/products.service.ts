import { Injectable, NotFoundException, UnprocessableEntityException } from '@nestjs/common';
import { JsonLogger } from '../logging/json-logger.service';
import { MAX_PRICE, MAX_QUANTITY } from './product.entity';
import type { NewProduct, Product, ProductPatch, ProductSort } from './product.entity';
import { ProductsRepository } from './products.repository';

export interface ProductInput {
  name: string;
  price: number;
  description?: string | null;
  quantity?: number;
}

// Field rules shared by create and update. DTO validation covers HTTP callers;
// these also hold for seeding and any other in-process caller.
function validationErrors(fields: ProductPatch): string[] {
  const errors: string[] = [];

  if ('name' in fields && (typeof fields.name !== 'string' || fields.name.trim().length === 0)) {
    errors.push('name must not be empty');
  }
  if ('price' in fields && (typeof fields.price !== 'number' || !Number.isFinite(fields.price) || fields.price < 0)) {
    errors.push('price must be a finite number greater than or equal to 0');
  }
  if ('price' in fields && typeof fields.price === 'number' && Number.isFinite(fields.price)) {
    if (Math.round(fields.price * 100) / 100 !== fields.price) {
      errors.push('price must have at most 2 decimal places');
    }
    if (fields.price > MAX_PRICE) {
      errors.push(`price must not be greater than ${MAX_PRICE}`);
    }
  }
  if ('quantity' in fields && (typeof fields.quantity !== 'number' || !Number.isInteger(fields.quantity) || fields.quantity < 0)) {
    errors.push('quantity must be a non-negative integer');
  } else if (typeof fields.quantity === 'number' && fields.quantity > MAX_QUANTITY) {
    errors.push(`quantity must not be greater than ${MAX_QUANTITY}`);
  }
  if ('description' in fields && fields.description !== null && typeof fields.description !== 'string') {
    errors.push('description must be a string or null');
  }

  return errors;
}

function assertValid(fields: ProductPatch) {
  const errors = validationErrors(fields);
  if (errors.length > 0) {
    throw new UnprocessableEntityException(errors);
  }
}

// Drops keys whose value is undefined so they count as absent.
function definedFields(patch: ProductPatch): ProductPatch {
  const result: ProductPatch = {};
  if (patch.name !== undefined) result.name = patch.name;
  if (patch.price !== undefined) result.price = patch.price;
  if (patch.description !== undefined) result.description = patch.description;
  if (patch.quantity !== undefined) result.quantity = patch.quantity;
  return result;
}

@Injectable()
export class ProductsService {
  constructor(private readonly products: ProductsRepository, private readonly logger: JsonLogger) {}

  async create(input: ProductInput, createdBy?: string): Promise<Product> {
    const fields = {
      name: input.name,
      price: input.price,
      description: input.description ?? null,
      quantity: input.quantity ?? 0
    };
    assertValid(fields);

    const product: NewProduct = { ...fields, name: fields.name.trim(), created_by: createdBy ?? null };
    const created = await this.products.insert(product);

    this.logger.log('Product created', { productId: created.id, createdBy: created.created_by });
    return created;
  }

  async findOne(id: number): Promise<Product> {
    const product = await this.products.findById(id);
    if (!product) {
      throw new NotFoundException('Product not found');
    }
    return product;
  }

  findAll(sort?: ProductSort): Promise<Product[]> {
    return this.products.findAll(sort);
  }

  /** Applies only the fields present in `patch`. An empty patch returns the product unchanged. */
  async update(id: number, patch: ProductPatch): Promise<Product> {
    const fields = definedFields(patch);

    if (Object.keys(fields).length === 0) {
      return this.findOne(id);
    }

    assertValid(fields);
    if (fields.name !== undefined) {
      fields.name = fields.name.trim();
    }

    const updated = await this.products.update(id, fields);
    if (!updated) {
      throw new NotFoundException('Product not found');
    }

    this.logger.log('Product updated', { productId: id, fields: Object.keys(fields) });
    return updated;
  }

  async remove(id: number): Promise<void> {
    const deleted = await this.products.delete(id);
    if (!deleted) {
      throw new NotFoundException('Product not found');
    }
    this.logger.log('Product deleted', { productId: id });
  }
}
