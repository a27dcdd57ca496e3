import type { DatabaseService } from '../../src/database/database.service';
import { loadProductSeed, ProductSeedService } from '../../src/products/product-seed.service';
import { ProductsService } from '../../src/products/products.service';
import { makeConfig, makeLogger } from '../support/context';
import { InMemoryProductsRepository } from '../support/in-memory-products.repository';

const SEED_PATH = 'data/default-products.json';

function makeSeeder(values: Record<string, unknown>, ready = true) {
  const repository = new InMemoryProductsRepository();
  const logger = makeLogger();
  const seeder = new ProductSeedService(
    new ProductsService(repository, logger),
    repository,
    { isReady: ready } as unknown as DatabaseService,
    makeConfig(values),
    logger
  );
  return { seeder, repository, logger };
}

describe('loadProductSeed', () => {
  it('reads the default catalogue and fills defaults', async () => {
    const seed = await loadProductSeed(SEED_PATH);

    expect(seed).toHaveLength(5);
    expect(seed[0]).toEqual({
      name: 'Standing desk',
      price: 349,
      description: 'Height-adjustable desk, 140x70 cm',
      quantity: 12
    });
    expect(seed[4].description).toBeNull();
  });

  it('names the invalid entries of a bad file', async () => {
    await expect(loadProductSeed('test/fixtures/invalid-products.json')).rejects.toThrow(
      'Invalid product seed file test/fixtures/invalid-products.json: 1.name, 1.price'
    );
  });
});

describe('ProductSeedService', () => {
  it('seeds an empty table once', async () => {
    const { seeder, repository } = makeSeeder({});

    await expect(seeder.seed(SEED_PATH)).resolves.toBe(5);
    await expect(seeder.seed(SEED_PATH)).resolves.toBe(0);
    await expect(repository.count()).resolves.toBe(5);
  });

  it('does nothing on startup unless enabled', async () => {
    const { seeder, repository } = makeSeeder({ SEED_DEFAULT_PRODUCTS: false });

    await seeder.onApplicationBootstrap();
    await expect(repository.count()).resolves.toBe(0);
  });

  it('seeds on startup from PRODUCT_SEED_PATH when enabled', async () => {
    const { seeder, repository } = makeSeeder({ SEED_DEFAULT_PRODUCTS: true, PRODUCT_SEED_PATH: SEED_PATH });

    await seeder.onApplicationBootstrap();
    await expect(repository.count()).resolves.toBe(5);
  });

  it('skips seeding without a database', async () => {
    const { seeder, repository, logger } = makeSeeder({ SEED_DEFAULT_PRODUCTS: true }, false);

    await seeder.onApplicationBootstrap();
    await expect(repository.count()).resolves.toBe(0);
    expect(logger.warn).toHaveBeenCalledWith('Skipping product seed: database not configured');
  });
});
