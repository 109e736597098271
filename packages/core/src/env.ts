import { z } from 'zod';

/**
 * Environment Variable Validation
 * Ensures the store connection and runtime options are well-formed at boot time
 */

// Base runtime config
const RuntimeEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

// Database config
const DatabaseEnvSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  DATABASE_SSL: z
    .enum(['true', 'false'])
    .optional()
    .default('false')
    .transform((v) => v === 'true'),
  DATABASE_MAX_CONNECTIONS: z
    .string()
    .optional()
    .transform((v) => (v ? parseInt(v, 10) : 10))
    .pipe(z.number().int().positive()),
});

// Catalog config
const CatalogEnvSchema = z.object({
  /** Language column preferred when describing items */
  CATALOG_LANGUAGE: z.enum(['en', 'fr', 'es']).optional().default('en'),
});

export const AppEnvSchema = RuntimeEnvSchema.merge(DatabaseEnvSchema).merge(CatalogEnvSchema);

// Production requires a store to read from
export const ProductionEnvSchema = AppEnvSchema.extend({
  DATABASE_URL: z.string().url(),
});

export type AppEnv = z.infer<typeof AppEnvSchema>;

/**
 * Validate environment variables
 * @param strict - If true, the database URL is required (production mode)
 */
export function validateEnv(
  strict = false,
  source: Record<string, string | undefined> = process.env
): AppEnv {
  const schema = strict ? ProductionEnvSchema : AppEnvSchema;

  const result = schema.safeParse(source);

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const errorMessages = Object.entries(errors)
      .map(([field, messages]) => `  ${field}: ${(messages ?? []).join(', ')}`)
      .join('\n');

    throw new Error(`Environment validation failed:\n${errorMessages}`);
  }

  return result.data;
}

/**
 * Get validated env with type safety
 */
export function getEnv(): AppEnv {
  const isProduction = process.env.NODE_ENV === 'production';
  return validateEnv(isProduction);
}
