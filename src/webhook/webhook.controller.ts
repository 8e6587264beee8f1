import {
  BadRequestException,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  Req,
  ServiceUnavailableException,
  UseGuards,
} from '@nestjs/common';
import { ApiBody, ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';

import { type WebhookAcceptedResponse, WebhookOutcome } from './webhook.interfaces';
import { AlertDeliveryQueueService } from '../alerts/alert-delivery-queue.service';
import { AlertPayloadValidator } from '../alerts/alert-payload.validator';
import { AlertValidationError } from '../alerts/alert-validation.error';
import { type AlertPayload, EnqueueStatus } from '../alerts/alert.interfaces';
import { getRequestContext, readRawBody } from '../common/http/request-context';
import type { RequestContext, RequestWithContext } from '../common/http/request-context.interfaces';
import {
  ERROR_RESPONSE_SCHEMA,
  WEBHOOK_ACCEPTED_SCHEMA,
  WEBHOOK_ALERT_BODY_SCHEMA,
} from '../common/swagger/api-schemas';
import { AppConfigService } from '../config/app-config.service';
import { MetricsService } from '../observability/metrics.service';
import { SIGNATURE_HEADER } from '../security/webhook-signature.service';
import { WebhookSignatureGuard } from '../security/webhook-signature.guard';

@ApiTags('Webhook')
@Controller('webhook')
export class WebhookController {
  private readonly logger: Logger = new Logger(WebhookController.name);

  public constructor(
    private readonly alertPayloadValidator: AlertPayloadValidator,
    private readonly alertDeliveryQueueService: AlertDeliveryQueueService,
    private readonly appConfigService: AppConfigService,
    private readonly metricsService: MetricsService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  @UseGuards(WebhookSignatureGuard)
  @ApiOperation({ summary: 'Accept a trading alert and queue it for Telegram delivery' })
  @ApiHeader({ name: SIGNATURE_HEADER, required: false, description: 'Hex HMAC-SHA256 of the body' })
  @ApiBody({ schema: WEBHOOK_ALERT_BODY_SCHEMA })
  @ApiResponse({ status: 202, description: 'Alert queued', schema: WEBHOOK_ACCEPTED_SCHEMA })
  @ApiResponse({ status: 400, description: 'Body is not JSON', schema: ERROR_RESPONSE_SCHEMA })
  @ApiResponse({ status: 403, description: 'Bad signature', schema: ERROR_RESPONSE_SCHEMA })
  @ApiResponse({ status: 422, description: 'Invalid alert', schema: ERROR_RESPONSE_SCHEMA })
  @ApiResponse({ status: 503, description: 'Queue is full', schema: ERROR_RESPONSE_SCHEMA })
  public receive(@Req() request: RequestWithContext): WebhookAcceptedResponse {
    const context: RequestContext = getRequestContext(request);
    const body: unknown = this.parseJsonBody(readRawBody(request), context.requestId);
    const payload: AlertPayload = this.validatePayload(body, context.requestId);

    this.enqueue(payload, context.requestId);
    this.metricsService.webhookRequestsTotal.inc({ outcome: WebhookOutcome.ACCEPTED });
    this.logger.log(
      `webhook accepted requestId=${context.requestId} ticker=${payload.ticker} signal=${payload.signal} price=${String(payload.price)}`,
    );
    this.checkResponseBudget(context);

    return {
      status: 'accepted',
      message: 'Webhook received and processing',
      request_id: context.requestId,
      timestamp: new Date().toISOString(),
    };
  }

  private parseJsonBody(rawBody: Buffer, requestId: string): unknown {
    try {
      return JSON.parse(rawBody.toString('utf8'));
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.warn(`webhook invalid json requestId=${requestId} reason=${errorMessage}`);
      this.metricsService.webhookRequestsTotal.inc({ outcome: WebhookOutcome.INVALID_JSON });
      throw new BadRequestException('Invalid JSON payload');
    }
  }

  private validatePayload(body: unknown, requestId: string): AlertPayload {
    try {
      return this.alertPayloadValidator.validate(body);
    } catch (error: unknown) {
      if (error instanceof AlertValidationError) {
        this.logger.warn(`webhook rejected requestId=${requestId} reason=${error.message}`);
        this.metricsService.webhookRequestsTotal.inc({ outcome: WebhookOutcome.INVALID_PAYLOAD });
      }

      throw error;
    }
  }

  private enqueue(payload: AlertPayload, requestId: string): void {
    const status: EnqueueStatus = this.alertDeliveryQueueService.enqueue({
      requestId,
      payload,
      enqueuedAtMs: Date.now(),
    });

    if (status === EnqueueStatus.QUEUED) {
      return;
    }

    const outcome: WebhookOutcome =
      status === EnqueueStatus.QUEUE_FULL ? WebhookOutcome.QUEUE_FULL : WebhookOutcome.SHUTTING_DOWN;
    this.metricsService.webhookRequestsTotal.inc({ outcome });

    throw new ServiceUnavailableException(
      status === EnqueueStatus.QUEUE_FULL ? 'Delivery queue is full' : 'Service is shutting down',
    );
  }

  // Soft deadline: the response is sent regardless.
  private checkResponseBudget(context: RequestContext): void {
    const elapsedMs: number = Date.now() - context.receivedAtMs;
    const budgetMs: number = this.appConfigService.webhookResponseBudgetMs;

    if (elapsedMs > budgetMs) {
      this.logger.warn(
        `webhook response budget exceeded requestId=${context.requestId} elapsedMs=${elapsedMs.toString()} budgetMs=${budgetMs.toString()}`,
      );
    }
  }
}
