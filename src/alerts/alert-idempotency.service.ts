import { Injectable, Logger } from '@nestjs/common';

import type { AlertPayload } from './alert.interfaces';
import { registerCache, SimpleCacheImpl } from '../common/utils/cache';
import { AppConfigService } from '../config/app-config.service';

export const IDEMPOTENCY_CACHE_NAME = 'alert_idempotency';

export const buildAlertFingerprint = (payload: AlertPayload): string =>
  [payload.ticker, payload.signal, payload.time].join(':');

/**
 * Remembers recently forwarded alerts by (ticker, signal, time) for a TTL window.
 *
 * `checkAndRecord` must stay synchronous: the lookup and the insert run in one event loop turn,
 * so two jobs with the same fingerprint cannot both pass. Keep it free of `await`.
 */
@Injectable()
export class AlertIdempotencyService {
  private readonly logger: Logger = new Logger(AlertIdempotencyService.name);
  private readonly lastSeenByFingerprint: SimpleCacheImpl<number>;

  public constructor(private readonly appConfigService: AppConfigService) {
    this.lastSeenByFingerprint = new SimpleCacheImpl<number>({
      ttlSec: 0,
      maxKeys: appConfigService.idempotencyMaxEntries,
    });
    registerCache(IDEMPOTENCY_CACHE_NAME, this.lastSeenByFingerprint);
  }

  public checkAndRecord(payload: AlertPayload, nowEpochMs: number = Date.now()): boolean {
    const fingerprint: string = buildAlertFingerprint(payload);
    const lastSeenEpochMs: number | undefined = this.lastSeenByFingerprint.get(fingerprint);

    if (lastSeenEpochMs !== undefined && nowEpochMs - lastSeenEpochMs < this.ttlMs) {
      return true;
    }

    if (lastSeenEpochMs !== undefined) {
      // Stale entry: delete first so the refreshed key moves to the eviction tail.
      this.lastSeenByFingerprint.del(fingerprint);
    }

    this.lastSeenByFingerprint.set(fingerprint, nowEpochMs);

    if (this.lastSeenByFingerprint.size() > this.appConfigService.idempotencyCleanupThreshold) {
      this.cleanup(nowEpochMs);
    }

    return false;
  }

  public cleanup(nowEpochMs: number = Date.now()): number {
    const removed: number = this.lastSeenByFingerprint.prune(
      (lastSeenEpochMs: number): boolean => nowEpochMs - lastSeenEpochMs > this.ttlMs,
    );

    if (removed > 0) {
      this.logger.debug(
        `idempotency cleanup removed=${removed.toString()} remaining=${this.size().toString()}`,
      );
    }

    return removed;
  }

  public size(): number {
    return this.lastSeenByFingerprint.size();
  }

  private get ttlMs(): number {
    return this.appConfigService.idempotencyTtlSec * 1000;
  }
}
