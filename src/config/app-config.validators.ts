import type { ParsedEnv } from './app-config.schema';

const CHAT_ID_PATTERN = /^(-?\d+|@[A-Za-z0-9_]{5,})$/;

export function assertAppConfig(parsedEnv: ParsedEnv): void {
  assertTelegramConfig(parsedEnv);
  assertRetryConfig(parsedEnv);
  assertIdempotencyConfig(parsedEnv);
}

function assertTelegramConfig(parsedEnv: ParsedEnv): void {
  if (!CHAT_ID_PATTERN.test(parsedEnv.TELEGRAM_CHAT_ID)) {
    throw new Error('TELEGRAM_CHAT_ID must be a numeric id or start with @');
  }

  if (!parsedEnv.TELEGRAM_API_BASE_URL.startsWith('https://')) {
    throw new Error('TELEGRAM_API_BASE_URL must use https');
  }
}

function assertRetryConfig(parsedEnv: ParsedEnv): void {
  if (parsedEnv.DELIVERY_RETRY_MAX_DELAY_MS < parsedEnv.DELIVERY_RETRY_BASE_DELAY_MS) {
    throw new Error('DELIVERY_RETRY_MAX_DELAY_MS must be >= DELIVERY_RETRY_BASE_DELAY_MS');
  }
}

function assertIdempotencyConfig(parsedEnv: ParsedEnv): void {
  if (parsedEnv.IDEMPOTENCY_MAX_ENTRIES < parsedEnv.IDEMPOTENCY_CLEANUP_THRESHOLD) {
    throw new Error('IDEMPOTENCY_MAX_ENTRIES must be >= IDEMPOTENCY_CLEANUP_THRESHOLD');
  }
}
