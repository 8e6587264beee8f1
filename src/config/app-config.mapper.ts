import type { ParsedEnv } from './app-config.schema';
import type { AppConfig } from './app-config.types';

export const mapAppConfig = (parsedEnv: ParsedEnv): AppConfig => ({
  ...mapCoreConfig(parsedEnv),
  ...mapWebhookConfig(parsedEnv),
  ...mapTelegramConfig(parsedEnv),
  ...mapDeliveryConfig(parsedEnv),
});

const mapCoreConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'appName'
  | 'appVersion'
  | 'nodeEnv'
  | 'debug'
  | 'logLevel'
  | 'host'
  | 'port'
  | 'corsAllowedOrigins'
  | 'metricsEnabled'
> => ({
  appName: parsedEnv.APP_NAME,
  appVersion: parsedEnv.APP_VERSION,
  nodeEnv: parsedEnv.NODE_ENV,
  debug: parsedEnv.DEBUG,
  logLevel: parsedEnv.LOG_LEVEL,
  host: parsedEnv.HOST,
  port: parsedEnv.PORT,
  corsAllowedOrigins: parseCsvList(parsedEnv.CORS_ALLOWED_ORIGINS),
  metricsEnabled: parsedEnv.METRICS_ENABLED,
});

const mapWebhookConfig = (
  parsedEnv: ParsedEnv,
): Pick<AppConfig, 'webhookSecret' | 'webhookSignatureRequired' | 'webhookResponseBudgetMs'> => ({
  webhookSecret: parsedEnv.WEBHOOK_SECRET,
  webhookSignatureRequired: parsedEnv.WEBHOOK_SIGNATURE_REQUIRED,
  webhookResponseBudgetMs: parsedEnv.WEBHOOK_RESPONSE_BUDGET_MS,
});

const mapTelegramConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'botToken'
  | 'telegramChatId'
  | 'telegramApiBaseUrl'
  | 'telegramTimeoutMs'
  | 'telegramMaxConnections'
  | 'rateLimitTelegramPerSecond'
> => ({
  botToken: parsedEnv.BOT_TOKEN,
  telegramChatId: parsedEnv.TELEGRAM_CHAT_ID,
  telegramApiBaseUrl: parsedEnv.TELEGRAM_API_BASE_URL.replace(/\/+$/, ''),
  telegramTimeoutMs: parsedEnv.TELEGRAM_TIMEOUT_MS,
  telegramMaxConnections: parsedEnv.TELEGRAM_MAX_CONNECTIONS,
  rateLimitTelegramPerSecond: parsedEnv.RATE_LIMIT_TELEGRAM_PER_SECOND,
});

const mapDeliveryConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'deliveryRetryAttempts'
  | 'deliveryRetryBaseDelayMs'
  | 'deliveryRetryBackoffMultiplier'
  | 'deliveryRetryMaxDelayMs'
  | 'idempotencyTtlSec'
  | 'idempotencyCleanupThreshold'
  | 'idempotencyMaxEntries'
  | 'deliveryQueueMax'
  | 'deliveryQueueConcurrency'
  | 'deliveryDrainTimeoutMs'
> => ({
  deliveryRetryAttempts: parsedEnv.DELIVERY_RETRY_ATTEMPTS,
  deliveryRetryBaseDelayMs: parsedEnv.DELIVERY_RETRY_BASE_DELAY_MS,
  deliveryRetryBackoffMultiplier: parsedEnv.DELIVERY_RETRY_BACKOFF_MULTIPLIER,
  deliveryRetryMaxDelayMs: parsedEnv.DELIVERY_RETRY_MAX_DELAY_MS,
  idempotencyTtlSec: parsedEnv.IDEMPOTENCY_TTL_SEC,
  idempotencyCleanupThreshold: parsedEnv.IDEMPOTENCY_CLEANUP_THRESHOLD,
  idempotencyMaxEntries: parsedEnv.IDEMPOTENCY_MAX_ENTRIES,
  deliveryQueueMax: parsedEnv.DELIVERY_QUEUE_MAX,
  deliveryQueueConcurrency: parsedEnv.DELIVERY_QUEUE_CONCURRENCY,
  deliveryDrainTimeoutMs: parsedEnv.DELIVERY_DRAIN_TIMEOUT_MS,
});

const parseCsvList = (rawValue: string | undefined): readonly string[] => {
  if (!rawValue) {
    return [];
  }

  return rawValue
    .split(',')
    .map((value: string): string => value.trim())
    .filter((value: string): boolean => value.length > 0);
};
