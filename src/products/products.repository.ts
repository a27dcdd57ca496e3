import type { NewProduct, Product, ProductPatch, ProductSort } from './product.entity';

/**
 * Product storage. Lookups and updates resolve to null, and delete to false,
 * when the id does not exist.
 */
export abstract class ProductsRepository {
  abstract insert(product: NewProduct): Promise<Product>;
  abstract findById(id: number): Promise<Product | null>;
  abstract findAll(sort?: ProductSort): Promise<Product[]>;
  abstract update(id: number, patch: ProductPatch): Promise<Product | null>;
  abstract delete(id: number): Promise<boolean>;
  abstract count(): Promise<number>;
}
