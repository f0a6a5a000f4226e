import dotenv from 'dotenv';
import { z } from 'zod';
import { ValidationError } from '@/lib/errors';

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false'])
    .optional()
    .transform(value => (value === undefined ? fallback : value === 'true'));

// Environment variables with defaults
const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  ENABLE_CACHING: booleanFlag(true),
  CACHE_TTL_MINUTES: z.coerce.number().positive().default(60),
  HISTORY_DAYS: z.coerce.number().int().positive().default(730),
  ZIGZAG_THRESHOLD: z.coerce.number().min(0).default(0.03),
  WINDOW_SIZE: z.coerce.number().int().positive().default(10),
  LOOK_BACK: z.coerce.number().int().positive().default(30),
  RISK_TOLERANCE: z.coerce.number().min(0).lt(1).default(0.02),
  INITIAL_INVESTMENT: z.coerce.number().positive().default(10000),
  VERBOSE: booleanFlag(false)
});

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  enableCaching: boolean;
  cacheTtlMinutes: number;
  historyDays: number;
  analysis: {
    zigzagThreshold: number;
    windowSize: number;
    lookBack: number;
    riskTolerance: number;
  };
  initialInvestment: number;
  verbose: boolean;
}

/**
 * Build the application config from an environment map.
 * Throws a ValidationError listing every invalid variable.
 */
export const parseConfig = (env: NodeJS.ProcessEnv): AppConfig => {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError('Invalid environment configuration', details);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    nodeEnv: values.NODE_ENV,
    enableCaching: values.ENABLE_CACHING,
    cacheTtlMinutes: values.CACHE_TTL_MINUTES,
    historyDays: values.HISTORY_DAYS,
    analysis: {
      zigzagThreshold: values.ZIGZAG_THRESHOLD,
      windowSize: values.WINDOW_SIZE,
      lookBack: values.LOOK_BACK,
      riskTolerance: values.RISK_TOLERANCE
    },
    initialInvestment: values.INITIAL_INVESTMENT,
    verbose: values.VERBOSE
  };
};

/**
 * Load `.env` into process.env and parse the result
 */
export const loadConfig = (): AppConfig => {
  dotenv.config();
  return parseConfig(process.env);
};
