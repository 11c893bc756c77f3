import { IANAZone } from 'luxon';
import { z } from 'zod';

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.preprocess((val) => Number(val), z.number()).default(3000),

  DATABASE_URL: z.string().url(),

  DB_SYNC: z.preprocess((val) => val === 'true', z.boolean()).default(false),
  DB_LOG: z.preprocess((val) => val === 'true', z.boolean()).default(false),

  // "today" for season windows and default match dates
  LADDER_TIMEZONE: z
    .string()
    .default('UTC')
    .refine((zone) => IANAZone.isValidZone(zone), {
      message: 'Must be a valid IANA time zone',
    }),

  ENABLE_CRONS: z.preprocess((val) => val !== 'false', z.boolean()).default(true),

  REPLAY_BATCH_SIZE: z
    .preprocess((val) => Number(val), z.number().int().min(1).max(5000))
    .default(500),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>) {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    console.error('❌ Invalid environment variables:', result.error.flatten().fieldErrors);
    throw new Error('Invalid environment variables');
  }

  return result.data;
}
