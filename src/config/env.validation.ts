import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  SCHEMA_MAX_LENGTH: z.coerce.number().int().positive().default(1_000_000),
  SCHEMA_ENV_PASSTHROUGH: booleanFlag,
});

/**
 * Validates process variables for ConfigModule. Unknown variables pass
 * through untouched.
 */
export function validateEnv(config: Record<string, unknown>): Record<string, unknown> {
  const result = EnvSchema.safeParse(config);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return { ...config, ...result.data };
}
