interface IWarningWindow {
  lastEmittedAtMs: number;
  suppressedCount: number;
}

/**
 * Lets one warning per key through every `cooldownMs`. Warnings swallowed in between are
 * counted so the next emitted line can report them.
 */
export class RateLimitedWarningEmitter {
  private readonly windows: Map<string, IWarningWindow> = new Map<string, IWarningWindow>();

  public constructor(private readonly cooldownMs: number) {}

  public shouldEmit(key: string, nowMs: number = Date.now()): boolean {
    const window: IWarningWindow | undefined = this.windows.get(key);

    if (window !== undefined && nowMs - window.lastEmittedAtMs < this.cooldownMs) {
      window.suppressedCount += 1;
      return false;
    }

    if (window === undefined) {
      this.windows.set(key, { lastEmittedAtMs: nowMs, suppressedCount: 0 });
    } else {
      window.lastEmittedAtMs = nowMs;
    }

    return true;
  }

  /** Returns how many warnings were swallowed for `key` since the last call and resets the count. */
  public takeSuppressedCount(key: string): number {
    const window: IWarningWindow | undefined = this.windows.get(key);

    if (window === undefined) {
      return 0;
    }

    const suppressedCount: number = window.suppressedCount;
    window.suppressedCount = 0;

    return suppressedCount;
  }
}
