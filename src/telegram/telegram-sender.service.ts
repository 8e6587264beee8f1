import { Inject, Injectable, Logger } from '@nestjs/common';
import { type Telegram, TelegramError } from 'telegraf';

import {
  DeliveryError,
  DeliveryRateLimitedError,
  DeliveryRemoteRejectedError,
  DeliveryTimeoutError,
  DeliveryTransportError,
} from './telegram-delivery.errors';
import { TelegramMessageFormatter } from './telegram-message.formatter';
import {
  type DeliveryResult,
  type OutboundMessage,
  TELEGRAM_CLIENT,
  type TelegramConnectionStatus,
} from './telegram.interfaces';
import type { AlertPayload } from '../alerts/alert.interfaces';
import { executeWithExponentialBackoff } from '../common/utils/network/exponential-backoff.util';
import { withTimeout } from '../common/utils/network/with-timeout.util';
import { AppConfigService } from '../config/app-config.service';
import { LimiterKey, RequestPriority } from '../rate-limiting/bottleneck-rate-limiter.interfaces';
import { BottleneckRateLimiterService } from '../rate-limiting/bottleneck-rate-limiter.service';

type SentTelegramMessage = Awaited<ReturnType<Telegram['sendMessage']>>;

const DEFAULT_RETRY_AFTER_SEC = 1;
const TOO_MANY_REQUESTS = 429;

@Injectable()
export class TelegramSenderService {
  private readonly logger: Logger = new Logger(TelegramSenderService.name);

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly rateLimiterService: BottleneckRateLimiterService,
    private readonly messageFormatter: TelegramMessageFormatter,
    @Inject(TELEGRAM_CLIENT) private readonly telegram: Telegram,
  ) {}

  /**
   * Formats the alert and posts it to the configured chat.
   *
   * Each attempt waits for the rate limiter before hitting the API. Rate limit
   * responses sleep for the server's `retry_after`; other failures back off
   * exponentially. Rejects with the last {@link DeliveryError} once attempts run out.
   */
  public async send(payload: AlertPayload, requestId: string): Promise<DeliveryResult> {
    const message: OutboundMessage = this.messageFormatter.format(
      payload,
      this.appConfigService.telegramChatId,
    );
    const maxAttempts: number = this.appConfigService.deliveryRetryAttempts;
    const startedAtMs: number = Date.now();
    let attemptsMade: number = 0;

    try {
      const sentMessage: SentTelegramMessage = await executeWithExponentialBackoff(
        async (attempt: number): Promise<SentTelegramMessage> => {
          attemptsMade = attempt;
          return this.attemptSend(message, requestId, attempt, maxAttempts);
        },
        {
          maxAttempts,
          baseDelayMs: this.appConfigService.deliveryRetryBaseDelayMs,
          multiplier: this.appConfigService.deliveryRetryBackoffMultiplier,
          maxDelayMs: this.appConfigService.deliveryRetryMaxDelayMs,
          shouldRetry: (error: unknown): boolean => error instanceof DeliveryError,
          resolveDelayMs: (error: unknown): number | null =>
            error instanceof DeliveryRateLimitedError ? error.retryAfterSec * 1000 : null,
          onRetry: (error: unknown, attempt: number, delayMs: number): void => {
            this.logger.warn(
              `delivery retry requestId=${requestId} attempt=${attempt.toString()}/${maxAttempts.toString()} delayMs=${delayMs.toString()} reason=${this.describeError(error)}`,
            );
          },
        },
      );
      const result: DeliveryResult = {
        messageId: sentMessage.message_id,
        chatId: message.chat_id,
        attempts: attemptsMade,
        durationMs: Date.now() - startedAtMs,
      };

      this.logger.log(
        `delivery success requestId=${requestId} messageId=${result.messageId.toString()} attempts=${result.attempts.toString()} durationMs=${result.durationMs.toString()}`,
      );

      return result;
    } catch (error: unknown) {
      const failure: unknown = error instanceof DeliveryError ? error.summarize() : error;
      const reason: string = failure instanceof Error ? failure.message : String(failure);

      this.logger.error(
        `delivery failed requestId=${requestId} attempts=${attemptsMade.toString()}/${maxAttempts.toString()} reason=${reason}`,
      );
      throw failure;
    }
  }

  public async probeConnection(): Promise<TelegramConnectionStatus> {
    const timeoutMs: number = this.appConfigService.telegramTimeoutMs;

    try {
      const botUser = await this.rateLimiterService.schedule(
        LimiterKey.TELEGRAM,
        async (): Promise<Awaited<ReturnType<Telegram['getMe']>>> =>
          withTimeout(
            this.telegram.getMe(),
            timeoutMs,
            (): Error => new DeliveryTimeoutError(timeoutMs, 1),
          ),
        RequestPriority.PROBE,
      );

      return { connected: true, botUsername: botUser.username, error: null };
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.warn(`telegram probe failed reason=${errorMessage}`);

      return { connected: false, botUsername: null, error: errorMessage };
    }
  }

  private async attemptSend(
    message: OutboundMessage,
    requestId: string,
    attempt: number,
    maxAttempts: number,
  ): Promise<SentTelegramMessage> {
    const timeoutMs: number = this.appConfigService.telegramTimeoutMs;
    // Aborted on timeout so a late answer cannot post a second copy on retry.
    const abortController: AbortController = new AbortController();

    try {
      return await this.rateLimiterService.schedule(
        LimiterKey.TELEGRAM,
        async (): Promise<SentTelegramMessage> => {
          this.logger.debug(
            `delivery attempt requestId=${requestId} attempt=${attempt.toString()}/${maxAttempts.toString()} chatId=${message.chat_id} textLength=${message.text.length.toString()}`,
          );

          return withTimeout(
            this.telegram.callApi(
              'sendMessage',
              {
                chat_id: message.chat_id,
                text: message.text,
                parse_mode: message.parse_mode,
                link_preview_options: { is_disabled: message.disable_web_page_preview },
              },
              { signal: abortController.signal },
            ),
            timeoutMs,
            (): Error => {
              abortController.abort();
              return new DeliveryTimeoutError(timeoutMs, attempt);
            },
          );
        },
      );
    } catch (error: unknown) {
      throw this.classifyError(error, attempt);
    }
  }

  private classifyError(error: unknown, attempt: number): DeliveryError {
    if (error instanceof DeliveryError) {
      return error;
    }

    if (error instanceof TelegramError) {
      if (error.response.error_code === TOO_MANY_REQUESTS) {
        return new DeliveryRateLimitedError(
          error.response.parameters?.retry_after ?? DEFAULT_RETRY_AFTER_SEC,
          attempt,
        );
      }

      return new DeliveryRemoteRejectedError(
        error.response.error_code,
        error.response.description,
        attempt,
      );
    }

    const reason: string = error instanceof Error ? error.message : String(error);

    return new DeliveryTransportError(reason, attempt, error);
  }

  private describeError(error: unknown): string {
    if (error instanceof DeliveryError) {
      return `${error.kind} ${error.message}`;
    }

    return error instanceof Error ? error.message : String(error);
  }
}
