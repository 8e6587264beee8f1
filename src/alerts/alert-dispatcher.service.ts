import { Injectable, Logger } from '@nestjs/common';

import { AlertIdempotencyService } from './alert-idempotency.service';
import {
  type DeliveryJob,
  DeliveryJobState,
  type DispatchOutcome,
} from './alert.interfaces';
import { MetricsService } from '../observability/metrics.service';
import { DeliveryError } from '../telegram/telegram-delivery.errors';
import { TelegramSenderService } from '../telegram/telegram-sender.service';
import type { DeliveryResult } from '../telegram/telegram.interfaces';

const MS_PER_SECOND = 1000;

@Injectable()
export class AlertDispatcherService {
  private readonly logger: Logger = new Logger(AlertDispatcherService.name);

  public constructor(
    private readonly alertIdempotencyService: AlertIdempotencyService,
    private readonly telegramSenderService: TelegramSenderService,
    private readonly metricsService: MetricsService,
  ) {}

  /**
   * Runs one delivery job to a terminal state. Failures are logged and counted,
   * never rethrown: the webhook caller has already been answered.
   */
  public async dispatch(job: DeliveryJob): Promise<DispatchOutcome> {
    const queueWaitMs: number = Date.now() - job.enqueuedAtMs;
    this.logTransition(job, DeliveryJobState.DEDUPLICATING, `queueWaitMs=${queueWaitMs.toString()}`);

    if (this.alertIdempotencyService.checkAndRecord(job.payload)) {
      this.logTransition(job, DeliveryJobState.SKIPPED);
      this.logger.log(
        `dispatch skipped duplicate requestId=${job.requestId} ticker=${job.payload.ticker} signal=${job.payload.signal} time=${job.payload.time}`,
      );
      this.metricsService.alertDeliveriesTotal.inc({ outcome: DeliveryJobState.SKIPPED });
      return DeliveryJobState.SKIPPED;
    }

    this.logTransition(job, DeliveryJobState.DELIVERING);
    const startedAtMs: number = Date.now();

    try {
      const result: DeliveryResult = await this.telegramSenderService.send(
        job.payload,
        job.requestId,
      );

      this.logTransition(job, DeliveryJobState.DELIVERED, `messageId=${result.messageId.toString()}`);
      this.recordOutcome(DeliveryJobState.DELIVERED, result.attempts, startedAtMs);
      return DeliveryJobState.DELIVERED;
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      const attempts: number = error instanceof DeliveryError ? error.attempts : 1;

      this.logTransition(job, DeliveryJobState.FAILED);
      this.logger.error(
        `dispatch failed requestId=${job.requestId} ticker=${job.payload.ticker} attempts=${attempts.toString()} reason=${errorMessage}`,
      );
      this.recordOutcome(DeliveryJobState.FAILED, attempts, startedAtMs);
      return DeliveryJobState.FAILED;
    }
  }

  private recordOutcome(outcome: DispatchOutcome, attempts: number, startedAtMs: number): void {
    this.metricsService.alertDeliveriesTotal.inc({ outcome });
    this.metricsService.alertDeliveryAttemptsTotal.inc(attempts);
    this.metricsService.alertDeliveryDurationSeconds.observe(
      { outcome },
      (Date.now() - startedAtMs) / MS_PER_SECOND,
    );
  }

  private logTransition(job: DeliveryJob, state: DeliveryJobState, details?: string): void {
    const suffix: string = details === undefined ? '' : ` ${details}`;
    this.logger.debug(`dispatch state requestId=${job.requestId} state=${state}${suffix}`);
  }
}
