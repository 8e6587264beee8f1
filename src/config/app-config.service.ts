import { Injectable } from '@nestjs/common';

import { mapAppConfig } from './app-config.mapper';
import { envSchema } from './app-config.schema';
import type { AppConfig } from './app-config.types';
import { assertAppConfig } from './app-config.validators';

@Injectable()
export class AppConfigService {
  private readonly config: AppConfig;

  public constructor() {
    const parseResult = envSchema.safeParse(process.env);

    if (!parseResult.success) {
      const formatted: string = parseResult.error.issues
        .map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid environment configuration: ${formatted}`);
    }

    assertAppConfig(parseResult.data);
    this.config = mapAppConfig(parseResult.data);
  }

  public get appName(): string {
    return this.config.appName;
  }

  public get appVersion(): string {
    return this.config.appVersion;
  }

  public get nodeEnv(): AppConfig['nodeEnv'] {
    return this.config.nodeEnv;
  }

  public get debug(): boolean {
    return this.config.debug;
  }

  public get logLevel(): AppConfig['logLevel'] {
    return this.config.logLevel;
  }

  public get host(): string {
    return this.config.host;
  }

  public get port(): number {
    return this.config.port;
  }

  public get corsAllowedOrigins(): readonly string[] {
    return this.config.corsAllowedOrigins;
  }

  public get metricsEnabled(): boolean {
    return this.config.metricsEnabled;
  }

  public get webhookSecret(): string {
    return this.config.webhookSecret;
  }

  public get webhookSignatureRequired(): boolean {
    return this.config.webhookSignatureRequired;
  }

  public get webhookResponseBudgetMs(): number {
    return this.config.webhookResponseBudgetMs;
  }

  public get botToken(): string {
    return this.config.botToken;
  }

  public get telegramChatId(): string {
    return this.config.telegramChatId;
  }

  public get telegramApiBaseUrl(): string {
    return this.config.telegramApiBaseUrl;
  }

  public get telegramTimeoutMs(): number {
    return this.config.telegramTimeoutMs;
  }

  public get telegramMaxConnections(): number {
    return this.config.telegramMaxConnections;
  }

  public get deliveryRetryAttempts(): number {
    return this.config.deliveryRetryAttempts;
  }

  public get deliveryRetryBaseDelayMs(): number {
    return this.config.deliveryRetryBaseDelayMs;
  }

  public get deliveryRetryBackoffMultiplier(): number {
    return this.config.deliveryRetryBackoffMultiplier;
  }

  public get deliveryRetryMaxDelayMs(): number {
    return this.config.deliveryRetryMaxDelayMs;
  }

  public get rateLimitTelegramPerSecond(): number {
    return this.config.rateLimitTelegramPerSecond;
  }

  public get idempotencyTtlSec(): number {
    return this.config.idempotencyTtlSec;
  }

  public get idempotencyCleanupThreshold(): number {
    return this.config.idempotencyCleanupThreshold;
  }

  public get idempotencyMaxEntries(): number {
    return this.config.idempotencyMaxEntries;
  }

  public get deliveryQueueMax(): number {
    return this.config.deliveryQueueMax;
  }

  public get deliveryQueueConcurrency(): number {
    return this.config.deliveryQueueConcurrency;
  }

  public get deliveryDrainTimeoutMs(): number {
    return this.config.deliveryDrainTimeoutMs;
  }
}
