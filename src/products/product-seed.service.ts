import { Injectable, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { DatabaseService } from '../database/database.service';
import { JsonLogger } from '../logging/json-logger.service';
import { ProductsRepository } from './products.repository';
import { ProductsService } from './products.service';

const seedSchema = z.array(
  z.object({
    name: z.string().min(1),
    price: z.number().nonnegative(),
    description: z.string().nullable().default(null),
    quantity: z.number().int().nonnegative().default(0)
  })
);

export type ProductSeed = z.infer<typeof seedSchema>;

export async function loadProductSeed(path: string): Promise<ProductSeed> {
  const text = await readFile(resolve(process.cwd(), path), 'utf8');
  const result = seedSchema.safeParse(JSON.parse(text));
  if (!result.success) {
    throw new Error(`Invalid product seed file ${path}: ${result.error.issues.map((i) => i.path.join('.')).join(', ')}`);
  }
  return result.data;
}

/** Fills an empty products table from PRODUCT_SEED_PATH when SEED_DEFAULT_PRODUCTS=true. */
@Injectable()
export class ProductSeedService implements OnApplicationBootstrap {
  constructor(
    private readonly productsService: ProductsService,
    private readonly products: ProductsRepository,
    private readonly db: DatabaseService,
    private readonly config: ConfigService,
    private readonly logger: JsonLogger
  ) {}

  async onApplicationBootstrap() {
    if (this.config.get<boolean>('SEED_DEFAULT_PRODUCTS') !== true) {
      return;
    }

    if (!this.db.isReady) {
      this.logger.warn('Skipping product seed: database not configured');
      return;
    }

    await this.seed(this.config.get<string>('PRODUCT_SEED_PATH') ?? 'data/default-products.json');
  }

  /** Resolves to the number of products inserted (0 when the table already had rows). */
  async seed(path: string): Promise<number> {
    if ((await this.products.count()) > 0) {
      return 0;
    }

    const seed = await loadProductSeed(path);
    for (const item of seed) {
      await this.productsService.create(item);
    }

    this.logger.log('Default products seeded', { count: seed.length, path });
    return seed.length;
  }
}
