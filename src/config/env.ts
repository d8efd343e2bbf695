import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const logLevels = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  LOCATION_CATALOG_PATH: z
    .string()
    .min(1)
    .optional()
    .describe('Path to the preset location catalog JSON file'),
  BUSINESS_HOURS_START: z
    .string()
    .default('8')
    .transform(value => Number(value))
    .pipe(z.number().int().min(0).max(23).describe('BUSINESS_HOURS_START must be within 0-23')),
  BUSINESS_HOURS_END: z
    .string()
    .default('18')
    .transform(value => Number(value))
    .pipe(z.number().int().min(0).max(23).describe('BUSINESS_HOURS_END must be within 0-23')),
  WEEKDAY_MAX_ATTEMPTS: z
    .string()
    .default('1000')
    .transform(value => Number(value))
    .pipe(
      z
        .number()
        .int()
        .min(1)
        .max(100000)
        .describe('WEEKDAY_MAX_ATTEMPTS must be within 1-100000')
    ),
  FRAME_SAMPLE_COUNT: z
    .string()
    .default('10')
    .transform(value => Number(value))
    .pipe(z.number().int().min(1).max(100).describe('FRAME_SAMPLE_COUNT must be within 1-100')),
  FRAME_DRIFT_MINUTES: z
    .string()
    .default('5')
    .transform(value => Number(value))
    .pipe(z.number().int().min(0).max(1440).describe('FRAME_DRIFT_MINUTES must be within 0-1440')),
  JPEG_QUALITY: z
    .string()
    .default('95')
    .transform(value => Number(value))
    .pipe(z.number().int().min(1).max(100).describe('JPEG_QUALITY must be within 1-100')),
  DEFAULT_SERVICE: z.string().min(1).default('house-washing-service'),
  EXIFTOOL_TASK_TIMEOUT_MS: z
    .string()
    .default('30000')
    .transform(value => Number(value))
    .pipe(
      z
        .number()
        .int()
        .min(1000)
        .max(600000)
        .describe('EXIFTOOL_TASK_TIMEOUT_MS must be within 1000-600000ms')
    ),
  OUTPUT_DIR: z.string().min(1).default('output')
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  const formatted = parseResult.error.flatten();
  const errors = Object.entries(formatted.fieldErrors)
    .map(([field, messages]) => `${field}: ${messages?.join(', ')}`)
    .join('\n');

  throw new Error(`Environment validation failed:\n${errors}`);
}

const data = parseResult.data;

if (data.BUSINESS_HOURS_START > data.BUSINESS_HOURS_END) {
  throw new Error(
    'Environment validation failed:\nBUSINESS_HOURS_START must not be later than BUSINESS_HOURS_END.'
  );
}

export const env = {
  ...data,
  isDevelopment: data.NODE_ENV === 'development',
  isProduction: data.NODE_ENV === 'production',
  isTest: data.NODE_ENV === 'test'
};

export type AppEnvironment = typeof env;
