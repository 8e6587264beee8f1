import { Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';

import { AlertDispatcherService } from './alert-dispatcher.service';
import { type DeliveryJob, EnqueueStatus, type IDeliveryQueueStats } from './alert.interfaces';
import { RateLimitedWarningEmitter } from '../common/utils/logging/rate-limited-warning-emitter';
import { withTimeout } from '../common/utils/network/with-timeout.util';
import { AppConfigService } from '../config/app-config.service';
import { MetricsService } from '../observability/metrics.service';

const OVERFLOW_WARNING_COOLDOWN_MS = 10_000;
const OVERFLOW_WARNING_KEY = 'queue_full';

class DrainTimeoutError extends Error {
  public constructor(timeoutMs: number) {
    super(`Delivery queue drain timed out after ${timeoutMs.toString()}ms`);
    this.name = 'DrainTimeoutError';
  }
}

/**
 * Bounded FIFO of delivery jobs served by a fixed number of workers.
 *
 * Only waiting jobs count towards `DELIVERY_QUEUE_MAX`; jobs already taken by a worker do not.
 */
@Injectable()
export class AlertDeliveryQueueService implements OnModuleDestroy {
  private readonly logger: Logger = new Logger(AlertDeliveryQueueService.name);
  private readonly pendingJobs: DeliveryJob[] = [];
  private readonly idleWaiters: (() => void)[] = [];
  private readonly overflowWarnings: RateLimitedWarningEmitter = new RateLimitedWarningEmitter(
    OVERFLOW_WARNING_COOLDOWN_MS,
  );
  private runningCount: number = 0;
  private accepting: boolean = true;

  public constructor(
    private readonly alertDispatcherService: AlertDispatcherService,
    private readonly appConfigService: AppConfigService,
    private readonly metricsService: MetricsService,
  ) {
    this.publishStats();
  }

  public enqueue(job: DeliveryJob): EnqueueStatus {
    if (!this.accepting) {
      this.logger.warn(`enqueue rejected shutting down requestId=${job.requestId}`);
      return EnqueueStatus.SHUTTING_DOWN;
    }

    const queueMax: number = this.appConfigService.deliveryQueueMax;

    if (this.pendingJobs.length >= queueMax) {
      if (this.overflowWarnings.shouldEmit(OVERFLOW_WARNING_KEY)) {
        const suppressed: number = this.overflowWarnings.takeSuppressedCount(OVERFLOW_WARNING_KEY);
        this.logger.warn(
          `queue overflow requestId=${job.requestId} queueSize=${this.pendingJobs.length.toString()}/${queueMax.toString()} suppressedSinceLastWarning=${suppressed.toString()}`,
        );
      }

      return EnqueueStatus.QUEUE_FULL;
    }

    this.pendingJobs.push(job);
    this.logger.debug(
      `job queued requestId=${job.requestId} queueSize=${this.pendingJobs.length.toString()}/${queueMax.toString()}`,
    );
    this.startWorkers();
    this.publishStats();

    return EnqueueStatus.QUEUED;
  }

  public getStats(): IDeliveryQueueStats {
    return {
      queued: this.pendingJobs.length,
      running: this.runningCount,
      accepting: this.accepting,
    };
  }

  public async onModuleDestroy(): Promise<void> {
    this.accepting = false;
    this.publishStats();

    if (this.isIdle()) {
      this.logger.log('Delivery queue stopped, nothing to drain');
      return;
    }

    const drainTimeoutMs: number = this.appConfigService.deliveryDrainTimeoutMs;
    this.logger.log(
      `Draining delivery queue queued=${this.pendingJobs.length.toString()} running=${this.runningCount.toString()} timeoutMs=${drainTimeoutMs.toString()}`,
    );

    try {
      await withTimeout(
        this.waitForIdle(),
        drainTimeoutMs,
        (): Error => new DrainTimeoutError(drainTimeoutMs),
      );
      this.logger.log('Delivery queue drained');
    } catch (error: unknown) {
      const droppedJobs: DeliveryJob[] = this.pendingJobs.splice(0);
      const errorMessage: string = error instanceof Error ? error.message : String(error);

      this.logger.warn(
        `${errorMessage} dropped=${droppedJobs.length.toString()} stillRunning=${this.runningCount.toString()}`,
      );
      this.publishStats();
    }
  }

  private startWorkers(): void {
    const concurrency: number = this.appConfigService.deliveryQueueConcurrency;

    while (this.runningCount < concurrency) {
      const job: DeliveryJob | undefined = this.pendingJobs.shift();

      if (job === undefined) {
        break;
      }

      this.runningCount += 1;
      void this.runJob(job);
    }
  }

  private async runJob(job: DeliveryJob): Promise<void> {
    try {
      await this.alertDispatcherService.dispatch(job);
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.error(`delivery worker failed requestId=${job.requestId} reason=${errorMessage}`);
    } finally {
      this.runningCount -= 1;
      this.startWorkers();
      this.publishStats();
      this.notifyIfIdle();
    }
  }

  private isIdle(): boolean {
    return this.pendingJobs.length === 0 && this.runningCount === 0;
  }

  private async waitForIdle(): Promise<void> {
    if (this.isIdle()) {
      return;
    }

    await new Promise<void>((resolve: () => void): void => {
      this.idleWaiters.push(resolve);
    });
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) {
      return;
    }

    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }

  private publishStats(): void {
    const stats: IDeliveryQueueStats = this.getStats();

    this.metricsService.deliveryQueueSize.set(stats.queued);
    this.metricsService.deliveryQueueRunning.set(stats.running);
    this.metricsService.deliveryQueueAccepting.set(stats.accepting ? 1 : 0);
  }
}
