import { Injectable, Logger, type OnApplicationBootstrap } from '@nestjs/common';

import type { AppHealthStatus, ServiceInfo, TelegramHealthStatus } from './health.types';
import { AppConfigService } from '../config/app-config.service';
import { TelegramSenderService } from '../telegram/telegram-sender.service';
import type { TelegramConnectionStatus } from '../telegram/telegram.interfaces';

export const DOCS_PATH = 'docs';

const MS_PER_SECOND = 1000;

const epochSeconds = (): number => Date.now() / MS_PER_SECOND;

@Injectable()
export class HealthService implements OnApplicationBootstrap {
  private readonly logger: Logger = new Logger(HealthService.name);

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly telegramSenderService: TelegramSenderService,
  ) {}

  public onApplicationBootstrap(): void {
    void this.probeOnStartup();
  }

  public getHealthStatus(): AppHealthStatus {
    return {
      status: 'healthy',
      timestamp: epochSeconds(),
      service: this.appConfigService.appName,
      version: this.appConfigService.appVersion,
    };
  }

  public async getTelegramHealth(): Promise<TelegramHealthStatus> {
    const connection: TelegramConnectionStatus =
      await this.telegramSenderService.probeConnection();

    if (connection.connected) {
      return { status: 'healthy', telegram_connected: true, timestamp: epochSeconds() };
    }

    return {
      status: 'unhealthy',
      telegram_connected: false,
      timestamp: epochSeconds(),
      error: connection.error ?? 'unknown error',
    };
  }

  public getServiceInfo(): ServiceInfo {
    return {
      service: this.appConfigService.appName,
      version: this.appConfigService.appVersion,
      status: 'running',
      timestamp: epochSeconds(),
      docs_url: this.appConfigService.debug ? `/${DOCS_PATH}` : null,
    };
  }

  private async probeOnStartup(): Promise<void> {
    const connection: TelegramConnectionStatus =
      await this.telegramSenderService.probeConnection();

    if (connection.connected) {
      this.logger.log(`Telegram reachable botUsername=${connection.botUsername ?? 'n/a'}`);
      return;
    }

    this.logger.warn(
      `Telegram unreachable at startup, alerts will be retried on delivery reason=${connection.error ?? 'n/a'}`,
    );
  }
}
