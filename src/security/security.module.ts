import { Module } from '@nestjs/common';

import { WebhookSignatureGuard } from './webhook-signature.guard';
import { WebhookSignatureService } from './webhook-signature.service';
import { ObservabilityModule } from '../observability/observability.module';

@Module({
  imports: [ObservabilityModule],
  providers: [WebhookSignatureService, WebhookSignatureGuard],
  exports: [WebhookSignatureService, WebhookSignatureGuard],
})
export class SecurityModule {}
