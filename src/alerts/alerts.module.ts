import { Module } from '@nestjs/common';

import { AlertDeliveryQueueService } from './alert-delivery-queue.service';
import { AlertDispatcherService } from './alert-dispatcher.service';
import { AlertIdempotencyService } from './alert-idempotency.service';
import { AlertPayloadValidator } from './alert-payload.validator';
import { ObservabilityModule } from '../observability/observability.module';
import { TelegramModule } from '../telegram/telegram.module';

@Module({
  imports: [TelegramModule, ObservabilityModule],
  providers: [
    AlertPayloadValidator,
    AlertIdempotencyService,
    AlertDispatcherService,
    AlertDeliveryQueueService,
  ],
  exports: [AlertPayloadValidator, AlertDeliveryQueueService],
})
export class AlertsModule {}
