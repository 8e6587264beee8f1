import { Module } from '@nestjs/common';

import { createTelegramClient } from './telegram-client.factory';
import { TelegramMessageFormatter } from './telegram-message.formatter';
import { TelegramSenderService } from './telegram-sender.service';
import { TELEGRAM_CLIENT } from './telegram.interfaces';
import { AppConfigService } from '../config/app-config.service';
import { RateLimitingModule } from '../rate-limiting/rate-limiting.module';

@Module({
  imports: [RateLimitingModule],
  providers: [
    {
      provide: TELEGRAM_CLIENT,
      inject: [AppConfigService],
      useFactory: createTelegramClient,
    },
    TelegramMessageFormatter,
    TelegramSenderService,
  ],
  exports: [TelegramSenderService],
})
export class TelegramModule {}
