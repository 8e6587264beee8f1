export enum TradeSignal {
  BUY = 'Buy',
  SELL = 'Sell',
}

export interface AlertPayload {
  readonly ticker: string;
  readonly signal: TradeSignal;
  readonly price: number;
  readonly time: string;
  readonly interval?: string;
  readonly chart?: string;
}

export interface AlertValidationIssue {
  readonly field: string;
  readonly message: string;
}

export interface DeliveryJob {
  readonly requestId: string;
  readonly payload: AlertPayload;
  readonly enqueuedAtMs: number;
}

export enum DeliveryJobState {
  QUEUED = 'queued',
  DEDUPLICATING = 'deduplicating',
  SKIPPED = 'skipped',
  DELIVERING = 'delivering',
  DELIVERED = 'delivered',
  FAILED = 'failed',
}

export type DispatchOutcome =
  | DeliveryJobState.SKIPPED
  | DeliveryJobState.DELIVERED
  | DeliveryJobState.FAILED;

export enum EnqueueStatus {
  QUEUED = 'queued',
  QUEUE_FULL = 'queue_full',
  SHUTTING_DOWN = 'shutting_down',
}

export interface IDeliveryQueueStats {
  readonly queued: number;
  readonly running: number;
  readonly accepting: boolean;
}
