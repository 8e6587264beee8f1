export enum DeliveryFailureKind {
  RATE_LIMITED = 'rate_limited',
  TIMEOUT = 'timeout',
  TRANSPORT = 'transport',
  REMOTE_REJECTED = 'remote_rejected',
}

/** Failure of a single outbound delivery attempt; `attempts` is the 1-based attempt number. */
export abstract class DeliveryError extends Error {
  public abstract readonly kind: DeliveryFailureKind;

  protected constructor(
    message: string,
    public readonly attempts: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Rewrites the message of the last attempt's error into the final delivery outcome. */
  public summarize(): this {
    const noun: string = this.attempts === 1 ? 'attempt' : 'attempts';
    this.message = `${this.kind} after ${this.attempts.toString()} ${noun}: ${this.message}`;
    return this;
  }
}

export class DeliveryRateLimitedError extends DeliveryError {
  public override readonly kind: DeliveryFailureKind = DeliveryFailureKind.RATE_LIMITED;

  public constructor(
    public readonly retryAfterSec: number,
    attempts: number,
  ) {
    super(`Telegram rate limit hit, retry after ${retryAfterSec.toString()}s`, attempts);
  }
}

export class DeliveryTimeoutError extends DeliveryError {
  public override readonly kind: DeliveryFailureKind = DeliveryFailureKind.TIMEOUT;

  public constructor(timeoutMs: number, attempts: number) {
    super(`Telegram request timed out after ${timeoutMs.toString()}ms`, attempts);
  }
}

export class DeliveryTransportError extends DeliveryError {
  public override readonly kind: DeliveryFailureKind = DeliveryFailureKind.TRANSPORT;

  public constructor(reason: string, attempts: number, cause: unknown) {
    super(`Telegram transport error: ${reason}`, attempts, { cause });
  }
}

export class DeliveryRemoteRejectedError extends DeliveryError {
  public override readonly kind: DeliveryFailureKind = DeliveryFailureKind.REMOTE_REJECTED;

  public constructor(
    public readonly errorCode: number,
    public readonly description: string,
    attempts: number,
  ) {
    super(`Telegram rejected message code=${errorCode.toString()}: ${description}`, attempts);
  }
}
