import { Logger } from '@nestjs/common';
import { z } from 'zod';

export const DEFAULT_BOOKING_TIMEZONE = 'America/La_Paz';

export const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  PORT: z.preprocess((val) => Number(val), z.number().int()).default(3000),

  DATABASE_URL: z.string().url(),

  DB_SYNC: z.preprocess((val) => val === 'true', z.boolean()).default(false),
  DB_LOG: z.preprocess((val) => val === 'true', z.boolean()).default(false),

  JWT_SECRET: z.string().min(1),
  JWT_EXPIRES_IN: z.string().default('7d'),

  // decides what "today" means for past-date and cancellation checks
  BOOKING_TIMEZONE: z.string().min(1).default(DEFAULT_BOOKING_TIMEZONE),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    new Logger('Config').error(
      `Invalid environment variables: ${JSON.stringify(
        result.error.flatten().fieldErrors,
      )}`,
    );
    throw new Error('Invalid environment variables');
  }

  return result.data;
}
