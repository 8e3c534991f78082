import { z } from 'zod';

const envSchema = z
  .object({
    NODE_ENV: z
      .enum(['development', 'test', 'production'])
      .default('development'),
    PORT: z.coerce.number().int().positive().default(3000),

    // Database
    DB_TYPE: z.enum(['postgres', 'better-sqlite3']).default('postgres'),
    DATABASE_URL: z.string().optional(),
    DATABASE_PATH: z.string().default('churn.sqlite'),

    // Redis (campaign dispatch queue)
    REDIS_HOST: z.string().default('localhost'),
    REDIS_PORT: z.coerce.number().int().positive().default(6379),

    // Scoring
    CHURN_MODEL_PATH: z.string().optional(),

    // Campaigns
    CAMPAIGN_MAX_RECIPIENTS: z.coerce.number().int().positive().default(10),
  })
  .refine((env) => env.DB_TYPE !== 'postgres' || !!env.DATABASE_URL, {
    message: 'DATABASE_URL is required when DB_TYPE is postgres',
    path: ['DATABASE_URL'],
  });

export type EnvConfig = z.infer<typeof envSchema>;

/** Passed to ConfigModule.forRoot; throws on the first invalid setup */
export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}
