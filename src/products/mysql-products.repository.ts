import { Injectable } from '@nestjs/common';
import type { ResultSetHeader, RowDataPacket } from 'mysql2';
import { DatabaseService } from '../database/database.service';
import { NewProduct, Product, PRODUCT_SORT_FIELDS, ProductPatch, ProductSort } from './product.entity';
import { ProductsRepository } from './products.repository';

interface ProductRow extends RowDataPacket, Product {}

interface CountRow extends RowDataPacket {
  total: number;
}

const UPDATABLE_COLUMNS = ['name', 'price', 'description', 'quantity'] as const;

@Injectable()
export class MysqlProductsRepository extends ProductsRepository {
  constructor(private readonly db: DatabaseService) {
    super();
  }

  insert(product: NewProduct): Promise<Product> {
    return this.db.transaction(async (tx) => {
      const result = await tx.sql<ResultSetHeader>`
        INSERT INTO products (name, price, description, quantity, created_by)
        VALUES (${product.name}, ${product.price}, ${product.description}, ${product.quantity}, ${product.created_by})
      `;
      const rows = await tx.sql<ProductRow[]>`SELECT * FROM products WHERE id = ${result.insertId}`;
      if (rows.length === 0) {
        throw new Error(`Inserted product ${result.insertId} could not be read back`);
      }
      return rows[0];
    });
  }

  async findById(id: number): Promise<Product | null> {
    const rows = await this.db.sql<ProductRow[]>`SELECT * FROM products WHERE id = ${id} LIMIT 1`;
    return rows[0] ?? null;
  }

  findAll(sort?: ProductSort): Promise<Product[]> {
    return this.db.selectAll<ProductRow[]>(
      'products',
      sort ? { column: sort.field, direction: sort.order } : undefined,
      PRODUCT_SORT_FIELDS
    );
  }

  update(id: number, patch: ProductPatch): Promise<Product | null> {
    return this.db.transaction(async (tx) => {
      await tx.updateByKey('products', 'id', id, { ...patch }, UPDATABLE_COLUMNS);
      // affectedRows is 0 for a no-op update too, so existence is decided by the read.
      const rows = await tx.sql<ProductRow[]>`SELECT * FROM products WHERE id = ${id}`;
      return rows[0] ?? null;
    });
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.db.sql<ResultSetHeader>`DELETE FROM products WHERE id = ${id}`;
    return result.affectedRows > 0;
  }

  async count(): Promise<number> {
    const rows = await this.db.sql<CountRow[]>`SELECT COUNT(*) AS total FROM products`;
    return Number(rows[0]?.total ?? 0);
  }
}
