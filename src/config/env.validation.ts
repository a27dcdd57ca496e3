import { z } from 'zod';

const TRUTHY = new Set(['true', '1', 'yes']);
const FALSY = new Set(['false', '0', 'no']);

/**
 * Boolean env flag. Accepts true/false/1/0/yes/no (any case); anything else is rejected
 * instead of being coerced, so `DB_SSL=flase` fails startup.
 */
const flag = (defaultValue: boolean) =>
  z
    .union([z.boolean(), z.string()])
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) return defaultValue;
      if (typeof value === 'boolean') return value;
      const normalized = value.trim().toLowerCase();
      if (TRUTHY.has(normalized)) return true;
      if (FALSY.has(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean flag, got "${value}"` });
      return z.NEVER;
    });

const envSchema = z.object({
  NODE_ENV: z.string().default('dev'),
  PORT: z.coerce.number().int().positive().default(3000),

  // Database is optional so the API can boot (and be tested) without MySQL.
  DB_HOST: z.string().min(1).optional(),
  DB_PORT: z.coerce.number().int().positive().default(3306),
  DB_USER: z.string().min(1).optional(),
  DB_PASSWORD: z.string().optional(),
  DB_NAME: z.string().min(1).optional(),
  DB_SSL: flag(false),
  DB_AUTO_MIGRATE: flag(false),
  DB_SCHEMA_PATH: z.string().min(1).default('sql/schema.sql'),

  JWT_SECRET: z.string().min(16),
  JWT_TTL_MINUTES: z.coerce.number().int().positive().default(60),

  PRODUCT_READS_PUBLIC: flag(false),
  SEED_DEFAULT_PRODUCTS: flag(false),
  PRODUCT_SEED_PATH: z.string().min(1).default('data/default-products.json'),

  ADMIN_USERNAME: z.string().min(1).max(64).optional(),
  ADMIN_PASSWORD: z.string().min(1).optional(),

  SWAGGER_ENABLED: flag(true),
  CORS_ORIGINS: z.string().optional()
});

export type AppEnv = z.infer<typeof envSchema>;

/**
 * Validates process.env once at startup (wired into ConfigModule.forRoot).
 * Error messages only name the offending keys, never their values.
 */
export function validateEnv(config: Record<string, unknown>): AppEnv {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const keys = Array.from(
      new Set(
        result.error.issues
          .map((issue) => issue.path[0])
          .filter((k): k is string => typeof k === 'string' && k.length > 0)
      )
    );
    const keyList = keys.length > 0 ? keys.join(', ') : 'unknown keys';
    throw new Error(
      `Invalid environment configuration. Missing/invalid: ${keyList}. Copy .env.example to .env and adjust it.`
    );
  }

  const parsed = result.data;

  if (Boolean(parsed.ADMIN_USERNAME) !== Boolean(parsed.ADMIN_PASSWORD)) {
    throw new Error('Invalid environment configuration. ADMIN_USERNAME and ADMIN_PASSWORD must be set together.');
  }

  return parsed;
}
