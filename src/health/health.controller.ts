import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';

import { HealthService } from './health.service';
import type { AppHealthStatus, TelegramHealthStatus } from './health.types';
import { HEALTH_SCHEMA, TELEGRAM_HEALTH_SCHEMA } from '../common/swagger/api-schemas';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  public constructor(private readonly healthService: HealthService) {}

  @Get()
  @ApiOperation({ summary: 'Liveness probe' })
  @ApiResponse({ status: 200, description: 'Service is up', schema: HEALTH_SCHEMA })
  public getHealthStatus(): AppHealthStatus {
    return this.healthService.getHealthStatus();
  }

  @Get('telegram')
  @ApiOperation({ summary: 'Probe the Telegram Bot API with getMe' })
  @ApiResponse({ status: 200, description: 'Probe result', schema: TELEGRAM_HEALTH_SCHEMA })
  public async getTelegramHealth(): Promise<TelegramHealthStatus> {
    return this.healthService.getTelegramHealth();
  }
}
