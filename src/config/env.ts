import { config } from 'dotenv';
import { z } from 'zod';

config();

const ratio = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().min(0).max(1));

const optionalInt = z
  .string()
  .optional()
  .transform((value) => (value ? Number.parseInt(value, 10) : undefined))
  .pipe(z.number().int().positive().optional());

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  CROSSWALK_STORE: z.enum(['postgres', 'memory']).default('postgres'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.string().default('5432').transform(Number),
  DB_USER: z.string().default('crosswalk'),
  DB_PASSWORD: z.string().default('crosswalk_dev_pass'),
  DB_NAME: z.string().default('player_crosswalk'),
  DB_POOL_MAX: optionalInt,
  DB_IDLE_TIMEOUT: optionalInt,
  DB_CONNECT_TIMEOUT: optionalInt,
  MATCH_ACCEPT_THRESHOLD: ratio('0.8'),
  MATCH_TIE_BAND: ratio('0.05'),
  ALIAS_MIN_CONFIDENCE: ratio('0.5'),
  LOOKUP_PREFERENCE: z.enum(['crosswalk', 'alias']).default('crosswalk'),
  ALIAS_DECAY_HALF_LIFE_DAYS: z.string().default('90').transform(Number).pipe(z.number().positive()),
  ALIAS_DECAY_FLOOR: ratio('0.3'),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv() {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const errors = error.issues.map((err) => `${err.path.join('.')}: ${err.message}`);
      throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
    }
    throw error;
  }
}

export const env = validateEnv();
