import { validateEnv } from '../../src/config/env.validation';

const BASE = { JWT_SECRET: 'test-secret-0123456789' };

describe('validateEnv', () => {
  it('applies defaults', () => {
    expect(validateEnv(BASE)).toMatchObject({
      NODE_ENV: 'dev',
      PORT: 3000,
      DB_PORT: 3306,
      DB_SSL: false,
      DB_AUTO_MIGRATE: false,
      DB_SCHEMA_PATH: 'sql/schema.sql',
      JWT_TTL_MINUTES: 60,
      PRODUCT_READS_PUBLIC: false,
      SEED_DEFAULT_PRODUCTS: false,
      PRODUCT_SEED_PATH: 'data/default-products.json',
      SWAGGER_ENABLED: true
    });
  });

  it('coerces numbers and boolean flags from strings', () => {
    const env = validateEnv({ ...BASE, PORT: '8080', JWT_TTL_MINUTES: '15', DB_SSL: 'yes', SWAGGER_ENABLED: 'FALSE' });
    expect(env.PORT).toBe(8080);
    expect(env.JWT_TTL_MINUTES).toBe(15);
    expect(env.DB_SSL).toBe(true);
    expect(env.SWAGGER_ENABLED).toBe(false);
  });

  it('rejects an unrecognised flag value', () => {
    expect(() => validateEnv({ ...BASE, DB_SSL: 'flase' })).toThrow(/Missing\/invalid: DB_SSL\./);
  });

  it('requires a JWT secret of at least 16 characters without echoing it', () => {
    let message = '';
    try {
      validateEnv({ JWT_SECRET: 'short-secret' });
    } catch (error) {
      message = error instanceof Error ? error.message : String(error);
    }
    expect(message).toContain('Missing/invalid: JWT_SECRET.');
    expect(message).not.toContain('short-secret');
  });

  it('requires the bootstrap admin credentials as a pair', () => {
    expect(() => validateEnv({ ...BASE, ADMIN_USERNAME: 'root' })).toThrow(
      'ADMIN_USERNAME and ADMIN_PASSWORD must be set together'
    );
    expect(validateEnv({ ...BASE, ADMIN_USERNAME: 'root', ADMIN_PASSWORD: 'pw' })).toMatchObject({
      ADMIN_USERNAME: 'root'
    });
  });
});
