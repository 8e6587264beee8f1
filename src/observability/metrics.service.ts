import { Injectable } from '@nestjs/common';
import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';

// Histogram bucket boundaries in seconds; upper buckets cover retries with backoff
/* eslint-disable no-magic-numbers */
const DELIVERY_DURATION_BUCKETS: number[] = [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60];
/* eslint-enable no-magic-numbers */

@Injectable()
export class MetricsService {
  private readonly registry: Registry;

  public readonly webhookRequestsTotal: Counter;
  public readonly alertDeliveriesTotal: Counter;
  public readonly alertDeliveryAttemptsTotal: Counter;
  public readonly alertDeliveryDurationSeconds: Histogram;
  public readonly deliveryQueueSize: Gauge;
  public readonly deliveryQueueRunning: Gauge;
  public readonly deliveryQueueAccepting: Gauge;
  public readonly rateLimitQueueSize: Gauge;
  public readonly rateLimitReservoir: Gauge;
  public readonly cacheEntries: Gauge;

  public constructor() {
    this.registry = new Registry();

    collectDefaultMetrics({ register: this.registry });

    this.webhookRequestsTotal = new Counter({
      name: 'webhook_requests_total',
      help: 'Total number of webhook requests by outcome',
      labelNames: ['outcome'] as const,
      registers: [this.registry],
    });

    this.alertDeliveriesTotal = new Counter({
      name: 'alert_deliveries_total',
      help: 'Total number of processed delivery jobs by outcome',
      labelNames: ['outcome'] as const,
      registers: [this.registry],
    });

    this.alertDeliveryAttemptsTotal = new Counter({
      name: 'alert_delivery_attempts_total',
      help: 'Total number of Telegram send attempts made for alerts',
      registers: [this.registry],
    });

    this.alertDeliveryDurationSeconds = new Histogram({
      name: 'alert_delivery_duration_seconds',
      help: 'Alert delivery duration in seconds, retries included',
      labelNames: ['outcome'] as const,
      buckets: DELIVERY_DURATION_BUCKETS,
      registers: [this.registry],
    });

    this.deliveryQueueSize = new Gauge({
      name: 'delivery_queue_size',
      help: 'Number of delivery jobs waiting for a worker',
      registers: [this.registry],
    });

    this.deliveryQueueRunning = new Gauge({
      name: 'delivery_queue_running',
      help: 'Number of delivery jobs currently processed by workers',
      registers: [this.registry],
    });

    this.deliveryQueueAccepting = new Gauge({
      name: 'delivery_queue_accepting',
      help: '1 while the delivery queue accepts new jobs, 0 once shutdown started',
      registers: [this.registry],
    });

    this.rateLimitQueueSize = new Gauge({
      name: 'rate_limit_queue_size',
      help: 'Current queue size for rate limiter',
      labelNames: ['limiter'] as const,
      registers: [this.registry],
    });

    this.rateLimitReservoir = new Gauge({
      name: 'rate_limit_reservoir',
      help: 'Remaining requests in the current rate limit window',
      labelNames: ['limiter'] as const,
      registers: [this.registry],
    });

    this.cacheEntries = new Gauge({
      name: 'cache_entries',
      help: 'Number of entries held by in-memory caches',
      labelNames: ['cache'] as const,
      registers: [this.registry],
    });
  }

  public async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  public getContentType(): string {
    return this.registry.contentType;
  }
}
