import { NotFoundException, UnprocessableEntityException } from '@nestjs/common';
import { MAX_PRICE, MAX_QUANTITY } from '../../src/products/product.entity';
import { ProductInput, ProductsService } from '../../src/products/products.service';
import { makeLogger } from '../support/context';
import { InMemoryProductsRepository } from '../support/in-memory-products.repository';

describe('ProductsService', () => {
  let service: ProductsService;

  beforeEach(() => {
    service = new ProductsService(new InMemoryProductsRepository(), makeLogger());
  });

  it('assigns new ids and reads back what was created', async () => {
    const lamp = await service.create({ name: 'Desk lamp', price: 39.9, description: 'LED', quantity: 4 }, 'bob');
    const chair = await service.create({ name: 'Chair', price: 120 });

    expect(lamp.id).toBe(1);
    expect(chair.id).toBe(2);
    await expect(service.findOne(1)).resolves.toMatchObject({
      name: 'Desk lamp',
      price: 39.9,
      description: 'LED',
      quantity: 4,
      created_by: 'bob'
    });
  });

  it('defaults description to null and quantity to 0', async () => {
    const product = await service.create({ name: 'Chair', price: 0 });
    expect(product).toMatchObject({ description: null, quantity: 0, created_by: null });
  });

  it('trims the name', async () => {
    await expect(service.create({ name: '  Chair  ', price: 10 })).resolves.toMatchObject({ name: 'Chair' });
  });

  const invalidInputs: Array<[string, ProductInput]> = [
    ['an empty name', { name: '   ', price: 1 }],
    ['a negative price', { name: 'Chair', price: -0.01 }],
    ['a NaN price', { name: 'Chair', price: Number.NaN }],
    ['an infinite price', { name: 'Chair', price: Number.POSITIVE_INFINITY }],
    ['a fractional quantity', { name: 'Chair', price: 1, quantity: 1.5 }],
    ['a negative quantity', { name: 'Chair', price: 1, quantity: -1 }],
    ['a price with three decimals', { name: 'Chair', price: 19.999 }],
    ['a price beyond DECIMAL(12,2)', { name: 'Chair', price: 1e13 }],
    ['a quantity beyond INT UNSIGNED', { name: 'Chair', price: 1, quantity: 2 ** 40 }]
  ];

  it.each(invalidInputs)('rejects %s with 422', async (_label, input) => {
    await expect(service.create(input)).rejects.toBeInstanceOf(UnprocessableEntityException);
  });

  it('lists every column-limit violation', async () => {
    await expect(service.create({ name: 'Chair', price: 19.999, quantity: 2 ** 40 })).rejects.toMatchObject({
      response: {
        statusCode: 422,
        message: ['price must have at most 2 decimal places', 'quantity must not be greater than 4294967295']
      }
    });
  });

  it('accepts the largest price and quantity the columns hold', async () => {
    await expect(
      service.create({ name: 'Chair', price: MAX_PRICE, quantity: MAX_QUANTITY })
    ).resolves.toMatchObject({ price: 9999999999.99, quantity: 4294967295 });
  });

  it('returns 404 for a missing product', async () => {
    await expect(service.findOne(42)).rejects.toThrow(new NotFoundException('Product not found'));
  });

  it('updates only the patched fields', async () => {
    await service.create({ name: 'Desk lamp', price: 39.9, description: 'LED', quantity: 4 });

    const updated = await service.update(1, { price: 35 });
    expect(updated).toMatchObject({ id: 1, name: 'Desk lamp', price: 35, description: 'LED', quantity: 4 });
    await expect(service.findOne(1)).resolves.toMatchObject({ price: 35, name: 'Desk lamp' });
  });

  it('clears the description when patched with null', async () => {
    await service.create({ name: 'Desk lamp', price: 39.9, description: 'LED' });
    await expect(service.update(1, { description: null })).resolves.toMatchObject({ description: null });
  });

  it('returns the product unchanged for an empty patch', async () => {
    const created = await service.create({ name: 'Desk lamp', price: 39.9 });

    await expect(service.update(1, {})).resolves.toEqual(created);
    await expect(service.update(1, { name: undefined })).resolves.toEqual(created);
  });

  it('validates patched fields and leaves the product untouched on failure', async () => {
    await service.create({ name: 'Desk lamp', price: 39.9 });

    await expect(service.update(1, { price: -5 })).rejects.toBeInstanceOf(UnprocessableEntityException);
    await expect(service.findOne(1)).resolves.toMatchObject({ price: 39.9 });
  });

  it('returns 404 when updating a missing product', async () => {
    await expect(service.update(7, { price: 1 })).rejects.toBeInstanceOf(NotFoundException);
    await expect(service.update(7, {})).rejects.toBeInstanceOf(NotFoundException);
  });

  it('deletes once and then reports 404', async () => {
    await service.create({ name: 'Desk lamp', price: 39.9 });

    await service.remove(1);
    await expect(service.findOne(1)).rejects.toBeInstanceOf(NotFoundException);
    await expect(service.remove(1)).rejects.toBeInstanceOf(NotFoundException);
  });

  it('lists in the requested order', async () => {
    await service.create({ name: 'B', price: 20 });
    await service.create({ name: 'A', price: 30 });
    await service.create({ name: 'C', price: 10 });

    const byPriceDesc = await service.findAll({ field: 'price', order: 'desc' });
    expect(byPriceDesc.map((p) => p.name)).toEqual(['A', 'B', 'C']);

    const byName = await service.findAll({ field: 'name', order: 'asc' });
    expect(byName.map((p) => p.id)).toEqual([2, 1, 3]);
  });
});
