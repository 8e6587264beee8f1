import {
  type CanActivate,
  type ExecutionContext,
  ForbiddenException,
  Injectable,
  Logger,
} from '@nestjs/common';

import { SignatureError } from './signature.error';
import { SIGNATURE_HEADER, WebhookSignatureService } from './webhook-signature.service';
import { getRequestContext, readRawBody } from '../common/http/request-context';
import type { RequestWithContext } from '../common/http/request-context.interfaces';
import { AppConfigService } from '../config/app-config.service';
import { MetricsService } from '../observability/metrics.service';
import { WebhookOutcome } from '../webhook/webhook.interfaces';

@Injectable()
export class WebhookSignatureGuard implements CanActivate {
  private readonly logger: Logger = new Logger(WebhookSignatureGuard.name);

  public constructor(
    private readonly webhookSignatureService: WebhookSignatureService,
    private readonly appConfigService: AppConfigService,
    private readonly metricsService: MetricsService,
  ) {}

  public canActivate(context: ExecutionContext): boolean {
    const request: RequestWithContext = context.switchToHttp().getRequest<RequestWithContext>();
    const { requestId } = getRequestContext(request);

    if (!this.appConfigService.webhookSignatureRequired) {
      this.logger.debug(`signature check skipped requestId=${requestId} enforcement=off`);
      return true;
    }

    try {
      return this.webhookSignatureService.verify(
        readRawBody(request),
        request.get(SIGNATURE_HEADER),
      );
    } catch (error: unknown) {
      if (!(error instanceof SignatureError)) {
        throw error;
      }

      this.logger.warn(`signature rejected requestId=${requestId} reason=${error.reason}`);
      this.metricsService.webhookRequestsTotal.inc({ outcome: WebhookOutcome.REJECTED_SIGNATURE });
      throw new ForbiddenException('Invalid webhook signature');
    }
  }
}
