import { Module } from '@nestjs/common';

import { LIMITER_CONFIGS } from './bottleneck-rate-limiter.interfaces';
import { BottleneckRateLimiterService } from './bottleneck-rate-limiter.service';
import { buildLimiterConfigs } from './rate-limiter-config.factory';
import { AppConfigService } from '../config/app-config.service';

@Module({
  providers: [
    {
      provide: LIMITER_CONFIGS,
      inject: [AppConfigService],
      useFactory: buildLimiterConfigs,
    },
    BottleneckRateLimiterService,
  ],
  exports: [BottleneckRateLimiterService],
})
export class RateLimitingModule {}
