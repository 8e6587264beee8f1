export type NodeEnv = 'development' | 'test' | 'production';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type AppConfig = {
  readonly appName: string;
  readonly appVersion: string;
  readonly nodeEnv: NodeEnv;
  readonly debug: boolean;
  readonly logLevel: LogLevel;
  readonly host: string;
  readonly port: number;
  readonly corsAllowedOrigins: readonly string[];
  readonly metricsEnabled: boolean;
  readonly webhookSecret: string;
  readonly webhookSignatureRequired: boolean;
  readonly webhookResponseBudgetMs: number;
  readonly botToken: string;
  readonly telegramChatId: string;
  readonly telegramApiBaseUrl: string;
  readonly telegramTimeoutMs: number;
  readonly telegramMaxConnections: number;
  readonly deliveryRetryAttempts: number;
  readonly deliveryRetryBaseDelayMs: number;
  readonly deliveryRetryBackoffMultiplier: number;
  readonly deliveryRetryMaxDelayMs: number;
  readonly rateLimitTelegramPerSecond: number;
  readonly idempotencyTtlSec: number;
  readonly idempotencyCleanupThreshold: number;
  readonly idempotencyMaxEntries: number;
  readonly deliveryQueueMax: number;
  readonly deliveryQueueConcurrency: number;
  readonly deliveryDrainTimeoutMs: number;
};
