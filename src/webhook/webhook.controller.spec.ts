import { BadRequestException, Logger, ServiceUnavailableException } from '@nestjs/common';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { WebhookController } from './webhook.controller';
import type { AlertDeliveryQueueService } from '../alerts/alert-delivery-queue.service';
import { AlertPayloadValidator } from '../alerts/alert-payload.validator';
import { AlertValidationError } from '../alerts/alert-validation.error';
import { EnqueueStatus, TradeSignal } from '../alerts/alert.interfaces';
import type { RequestWithContext } from '../common/http/request-context.interfaces';
import type { AppConfigService } from '../config/app-config.service';
import { MetricsService } from '../observability/metrics.service';

type QueueStub = {
  readonly enqueue: ReturnType<typeof vi.fn>;
};

const createRequest = (rawBody: string, receivedAtMs: number = Date.now()): RequestWithContext =>
  ({
    body: Buffer.from(rawBody),
    requestContext: { requestId: 'req-ctl', receivedAtMs },
    get: vi.fn(),
  }) as unknown as RequestWithContext;

const createController = (): {
  readonly controller: WebhookController;
  readonly queueStub: QueueStub;
  readonly metricsService: MetricsService;
} => {
  const queueStub: QueueStub = { enqueue: vi.fn().mockReturnValue(EnqueueStatus.QUEUED) };
  const metricsService: MetricsService = new MetricsService();
  const controller: WebhookController = new WebhookController(
    new AlertPayloadValidator(),
    queueStub as unknown as AlertDeliveryQueueService,
    { webhookResponseBudgetMs: 150 } as unknown as AppConfigService,
    metricsService,
  );

  return { controller, queueStub, metricsService };
};

const VALID_BODY: string = JSON.stringify({
  ticker: 'btcusdt',
  signal: 'buy',
  price: 45000,
  time: '2025-01-15T10:30:00Z',
});

describe('WebhookController', (): void => {
  afterEach((): void => {
    vi.restoreAllMocks();
  });

  it('queues a valid alert and acknowledges it', async (): Promise<void> => {
    const { controller, queueStub, metricsService } = createController();

    const response = controller.receive(createRequest(VALID_BODY));

    expect(response).toMatchObject({
      status: 'accepted',
      message: 'Webhook received and processing',
      request_id: 'req-ctl',
    });
    expect(Number.isNaN(Date.parse(response.timestamp))).toBe(false);
    expect(queueStub.enqueue).toHaveBeenCalledWith(
      expect.objectContaining({
        requestId: 'req-ctl',
        payload: {
          ticker: 'BTCUSDT',
          signal: TradeSignal.BUY,
          price: 45000,
          time: '2025-01-15T10:30:00Z',
        },
      }),
    );
    expect(await metricsService.getMetrics()).toContain(
      'webhook_requests_total{outcome="accepted"} 1',
    );
  });

  it.each([['not json'], [''], ['{"ticker":']])(
    'answers 400 for body %j',
    (rawBody: string): void => {
      const { controller, queueStub } = createController();

      expect(() => controller.receive(createRequest(rawBody))).toThrow(BadRequestException);
      expect(queueStub.enqueue).not.toHaveBeenCalled();
    },
  );

  it('passes validation errors on without queueing', async (): Promise<void> => {
    const { controller, queueStub, metricsService } = createController();

    expect(() => controller.receive(createRequest('{"ticker":""}'))).toThrow(AlertValidationError);
    expect(queueStub.enqueue).not.toHaveBeenCalled();
    expect(await metricsService.getMetrics()).toContain(
      'webhook_requests_total{outcome="invalid_payload"} 1',
    );
  });

  it('answers 503 when the delivery queue is full', (): void => {
    const { controller, queueStub } = createController();
    queueStub.enqueue.mockReturnValue(EnqueueStatus.QUEUE_FULL);

    expect(() => controller.receive(createRequest(VALID_BODY))).toThrow(
      new ServiceUnavailableException('Delivery queue is full'),
    );
  });

  it('warns but still answers when the response budget is exceeded', (): void => {
    const warnSpy = vi.spyOn(Logger.prototype, 'warn').mockImplementation((): void => undefined);
    const { controller } = createController();

    const response = controller.receive(createRequest(VALID_BODY, Date.now() - 1000));

    expect(response.status).toBe('accepted');
    expect(warnSpy).toHaveBeenCalledWith(
      expect.stringContaining('webhook response budget exceeded requestId=req-ctl'),
    );
  });
});
