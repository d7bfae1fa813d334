import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

import { AlgorithmNameSchema, EncryptionKeysSchema, PersonalizationSchema } from '../lib/validation.js';

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
  MONGO_URI: z
    .string()
    .url('MONGO_URI must be a valid connection string')
    .default('mongodb://localhost:27017/sealed_fields'),
  MONGO_MAX_POOL_SIZE: z
    .string()
    .default('20')
    .transform(value => Number(value))
    .pipe(z.number().int().min(1).max(500).describe('MONGO_MAX_POOL_SIZE must be within 1-500')),
  MONGO_MIN_POOL_SIZE: z
    .string()
    .default('5')
    .transform(value => Number(value))
    .pipe(z.number().int().min(0).max(500).describe('MONGO_MIN_POOL_SIZE must be within 0-500')),
  MONGO_CONNECT_TIMEOUT_MS: z
    .string()
    .default('10000')
    .transform(value => Number(value))
    .pipe(z.number().int().min(1000).describe('MONGO_CONNECT_TIMEOUT_MS must be >= 1000ms')),
  MONGO_SERVER_SELECTION_TIMEOUT_MS: z
    .string()
    .default('5000')
    .transform(value => Number(value))
    .pipe(z.number().int().min(1000).describe('MONGO_SERVER_SELECTION_TIMEOUT_MS must be >= 1000ms')),
  MONGO_HEARTBEAT_FREQUENCY_MS: z
    .string()
    .default('10000')
    .transform(value => Number(value))
    .pipe(z.number().int().min(1000).describe('MONGO_HEARTBEAT_FREQUENCY_MS must be >= 1000ms')),
  ENCRYPTION_KEYS: z
    .string()
    .default('{}')
    .transform((value, ctx) => {
      try {
        const parsed: unknown = JSON.parse(value);
        return parsed;
      } catch {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'ENCRYPTION_KEYS must be a JSON object of version to base64 key'
        });
        return z.NEVER;
      }
    })
    .pipe(EncryptionKeysSchema)
    .describe('JSON object mapping key versions to base64-encoded master keys'),
  CURRENT_KEY_VERSION: z.string().min(1).optional(),
  ENCRYPTION_PERSONALIZATION: PersonalizationSchema.optional(),
  ENCRYPTION_ALGORITHM: AlgorithmNameSchema.optional()
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

if (data.CURRENT_KEY_VERSION && !(data.CURRENT_KEY_VERSION in data.ENCRYPTION_KEYS)) {
  throw new Error(
    `Environment validation failed:\nCURRENT_KEY_VERSION "${data.CURRENT_KEY_VERSION}" has no entry in ENCRYPTION_KEYS.`
  );
}

export const env = {
  ...data,
  isDevelopment: data.NODE_ENV === 'development',
  isProduction: data.NODE_ENV === 'production',
  isTest: data.NODE_ENV === 'test'
};

export type AppEnvironment = typeof env;
