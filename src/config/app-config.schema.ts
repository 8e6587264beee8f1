import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';

const booleanSchema = z
  .union([z.boolean(), z.string()])
  .transform((value: string | boolean): boolean => {
    if (typeof value === 'boolean') {
      return value;
    }

    const normalizedValue: string = value.trim().toLowerCase();

    return normalizedValue === 'true' || normalizedValue === '1' || normalizedValue === 'yes';
  });

const resolvePackageVersion = (): string => {
  try {
    const packageJsonPath: string = resolve(process.cwd(), 'package.json');
    const packageJsonRaw: string = readFileSync(packageJsonPath, 'utf8');
    const packageJsonParsed: unknown = JSON.parse(packageJsonRaw);

    if (
      typeof packageJsonParsed === 'object' &&
      packageJsonParsed !== null &&
      'version' in packageJsonParsed
    ) {
      const versionValue: unknown = packageJsonParsed.version;

      if (typeof versionValue === 'string' && versionValue.trim().length > 0) {
        return versionValue.trim();
      }
    }
  } catch {
    // Fallback is handled below.
  }

  return '0.0.0';
};

const requiredSecretSchema = (name: string) =>
  z
    .string({ error: `${name} is required` })
    .trim()
    .min(1, { error: `${name} is required` });

const DEFAULT_APP_NAME = 'trading-signal-relay';
const DEFAULT_APP_VERSION: string = resolvePackageVersion();
const DEFAULT_HOST = '0.0.0.0';
const DEFAULT_PORT = 8000;
const DEFAULT_RESPONSE_BUDGET_MS = 150;
const DEFAULT_TELEGRAM_API_BASE_URL = 'https://api.telegram.org';
const DEFAULT_TELEGRAM_TIMEOUT_MS = 10_000;
const DEFAULT_TELEGRAM_MAX_CONNECTIONS = 10;
const DEFAULT_RETRY_ATTEMPTS = 3;
const MAX_RETRY_ATTEMPTS = 10;
const DEFAULT_RETRY_BASE_DELAY_MS = 1000;
const DEFAULT_RETRY_BACKOFF_MULTIPLIER = 2;
const DEFAULT_RETRY_MAX_DELAY_MS = 60_000;
const DEFAULT_RATE_LIMIT_TELEGRAM_PER_SECOND = 30;
const DEFAULT_IDEMPOTENCY_TTL_SEC = 300;
const DEFAULT_IDEMPOTENCY_CLEANUP_THRESHOLD = 100;
const DEFAULT_IDEMPOTENCY_MAX_ENTRIES = 10_000;
const DEFAULT_DELIVERY_QUEUE_MAX = 1000;
const DEFAULT_DELIVERY_QUEUE_CONCURRENCY = 4;
const DEFAULT_DELIVERY_DRAIN_TIMEOUT_MS = 10_000;

export const envSchema = z.object({
  APP_NAME: z.string().trim().min(1).default(DEFAULT_APP_NAME),
  APP_VERSION: z.string().trim().min(1).default(DEFAULT_APP_VERSION),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  DEBUG: booleanSchema.default(false),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['debug', 'info', 'warn', 'error']))
    .default('info'),
  HOST: z.string().trim().min(1).default(DEFAULT_HOST),
  PORT: z.coerce.number().int().positive().default(DEFAULT_PORT),
  WEBHOOK_SECRET: requiredSecretSchema('WEBHOOK_SECRET'),
  WEBHOOK_SIGNATURE_REQUIRED: booleanSchema.default(true),
  WEBHOOK_RESPONSE_BUDGET_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_RESPONSE_BUDGET_MS),
  BOT_TOKEN: requiredSecretSchema('BOT_TOKEN'),
  TELEGRAM_CHAT_ID: requiredSecretSchema('TELEGRAM_CHAT_ID'),
  TELEGRAM_API_BASE_URL: z.url().default(DEFAULT_TELEGRAM_API_BASE_URL),
  TELEGRAM_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TELEGRAM_TIMEOUT_MS),
  TELEGRAM_MAX_CONNECTIONS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_TELEGRAM_MAX_CONNECTIONS),
  DELIVERY_RETRY_ATTEMPTS: z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_RETRY_ATTEMPTS)
    .default(DEFAULT_RETRY_ATTEMPTS),
  DELIVERY_RETRY_BASE_DELAY_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_RETRY_BASE_DELAY_MS),
  DELIVERY_RETRY_BACKOFF_MULTIPLIER: z.coerce
    .number()
    .min(1)
    .default(DEFAULT_RETRY_BACKOFF_MULTIPLIER),
  DELIVERY_RETRY_MAX_DELAY_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_RETRY_MAX_DELAY_MS),
  RATE_LIMIT_TELEGRAM_PER_SECOND: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_RATE_LIMIT_TELEGRAM_PER_SECOND),
  IDEMPOTENCY_TTL_SEC: z.coerce.number().int().positive().default(DEFAULT_IDEMPOTENCY_TTL_SEC),
  IDEMPOTENCY_CLEANUP_THRESHOLD: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_IDEMPOTENCY_CLEANUP_THRESHOLD),
  IDEMPOTENCY_MAX_ENTRIES: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_IDEMPOTENCY_MAX_ENTRIES),
  DELIVERY_QUEUE_MAX: z.coerce.number().int().positive().default(DEFAULT_DELIVERY_QUEUE_MAX),
  DELIVERY_QUEUE_CONCURRENCY: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_DELIVERY_QUEUE_CONCURRENCY),
  DELIVERY_DRAIN_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_DELIVERY_DRAIN_TIMEOUT_MS),
  CORS_ALLOWED_ORIGINS: z.string().trim().default('*'),
  METRICS_ENABLED: booleanSchema.default(true),
});

export type ParsedEnv = z.infer<typeof envSchema>;
