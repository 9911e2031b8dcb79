import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((v) => v === 'true' || v === '1');

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
    TABLE_URL: z.string().url().default('https://example.com/tables'),
    /** `{team}` is replaced by the team id */
    STATS_URL: z.string().includes('{team}').default('https://example.com/clubs/{team}/stats'),
    SNAPSHOT_DIR: z.string().default('./snapshots'),
    EXTRACT_DIR: z.string().default('./extracted'),
    EXPORT_PATH: z.string().default('./league_data.csv'),
    PACING_MIN_MS: z.coerce.number().int().nonnegative().default(5000),
    PACING_MAX_MS: z.coerce.number().int().nonnegative().default(10000),
    NAV_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    PAGINATION_RETRIES: z.coerce.number().int().nonnegative().default(3),
    STATS_PAGES: z.coerce.number().int().positive().default(2),
    HEADLESS: booleanFlag,
  })
  .refine((env) => env.PACING_MIN_MS <= env.PACING_MAX_MS, {
    message: 'PACING_MIN_MS must not exceed PACING_MAX_MS',
    path: ['PACING_MIN_MS'],
  });

export const config = envSchema.parse(process.env);
