import { describe, expect, it, vi } from 'vitest';

import { AlertDispatcherService } from './alert-dispatcher.service';
import { AlertIdempotencyService } from './alert-idempotency.service';
import { type DeliveryJob, DeliveryJobState, TradeSignal } from './alert.interfaces';
import type { AppConfigService } from '../config/app-config.service';
import { MetricsService } from '../observability/metrics.service';
import { DeliveryTransportError } from '../telegram/telegram-delivery.errors';
import type { TelegramSenderService } from '../telegram/telegram-sender.service';

type SenderStub = {
  readonly send: ReturnType<typeof vi.fn>;
};

const buildJob = (requestId: string): DeliveryJob => ({
  requestId,
  enqueuedAtMs: Date.now(),
  payload: {
    ticker: 'ETHUSDT',
    signal: TradeSignal.SELL,
    price: 3120.5,
    time: '2025-02-01T08:00:00Z',
  },
});

const createDispatcher = (): {
  readonly dispatcher: AlertDispatcherService;
  readonly senderStub: SenderStub;
  readonly metricsService: MetricsService;
} => {
  const appConfigService: AppConfigService = {
    idempotencyTtlSec: 300,
    idempotencyCleanupThreshold: 100,
    idempotencyMaxEntries: 10_000,
  } as unknown as AppConfigService;
  const senderStub: SenderStub = { send: vi.fn() };
  const metricsService: MetricsService = new MetricsService();
  const dispatcher: AlertDispatcherService = new AlertDispatcherService(
    new AlertIdempotencyService(appConfigService),
    senderStub as unknown as TelegramSenderService,
    metricsService,
  );

  return { dispatcher, senderStub, metricsService };
};

describe('AlertDispatcherService', (): void => {
  it('delivers a new alert and counts the attempts', async (): Promise<void> => {
    const { dispatcher, senderStub, metricsService } = createDispatcher();
    const job: DeliveryJob = buildJob('req-1');
    senderStub.send.mockResolvedValue({
      messageId: 11,
      chatId: '-1001234567890',
      attempts: 2,
      durationMs: 1200,
    });

    const outcome = await dispatcher.dispatch(job);
    const metrics: string = await metricsService.getMetrics();

    expect(outcome).toBe(DeliveryJobState.DELIVERED);
    expect(senderStub.send).toHaveBeenCalledWith(job.payload, 'req-1');
    expect(metrics).toContain('alert_deliveries_total{outcome="delivered"} 1');
    expect(metrics).toContain('alert_delivery_attempts_total 2');
  });

  it('skips a duplicate alert without calling Telegram again', async (): Promise<void> => {
    const { dispatcher, senderStub, metricsService } = createDispatcher();
    senderStub.send.mockResolvedValue({
      messageId: 12,
      chatId: '-1001234567890',
      attempts: 1,
      durationMs: 80,
    });

    const firstOutcome = await dispatcher.dispatch(buildJob('req-2'));
    const secondOutcome = await dispatcher.dispatch(buildJob('req-3'));
    const metrics: string = await metricsService.getMetrics();

    expect(firstOutcome).toBe(DeliveryJobState.DELIVERED);
    expect(secondOutcome).toBe(DeliveryJobState.SKIPPED);
    expect(senderStub.send).toHaveBeenCalledTimes(1);
    expect(metrics).toContain('alert_deliveries_total{outcome="skipped"} 1');
  });

  it('swallows delivery errors and reports the job as failed', async (): Promise<void> => {
    const { dispatcher, senderStub, metricsService } = createDispatcher();
    senderStub.send.mockRejectedValue(
      new DeliveryTransportError('connect ECONNREFUSED', 3, new Error('connect ECONNREFUSED')),
    );

    const outcome = await dispatcher.dispatch(buildJob('req-4'));
    const metrics: string = await metricsService.getMetrics();

    expect(outcome).toBe(DeliveryJobState.FAILED);
    expect(metrics).toContain('alert_deliveries_total{outcome="failed"} 1');
    expect(metrics).toContain('alert_delivery_attempts_total 3');
  });

  it('treats unexpected errors as a single failed attempt', async (): Promise<void> => {
    const { dispatcher, senderStub, metricsService } = createDispatcher();
    senderStub.send.mockRejectedValue(new TypeError('formatter exploded'));

    const outcome = await dispatcher.dispatch(buildJob('req-5'));
    const metrics: string = await metricsService.getMetrics();

    expect(outcome).toBe(DeliveryJobState.FAILED);
    expect(metrics).toContain('alert_delivery_attempts_total 1');
  });
});
