import { Module } from '@nestjs/common';

import { WebhookController } from './webhook.controller';
import { AlertsModule } from '../alerts/alerts.module';
import { ObservabilityModule } from '../observability/observability.module';
import { SecurityModule } from '../security/security.module';

@Module({
  imports: [AlertsModule, SecurityModule, ObservabilityModule],
  controllers: [WebhookController],
})
export class WebhookModule {}
