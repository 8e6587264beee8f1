import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';

import { HealthService } from './health.service';
import type { ServiceInfo } from './health.types';
import { SERVICE_INFO_SCHEMA } from '../common/swagger/api-schemas';

@ApiTags('Health')
@Controller()
export class RootController {
  public constructor(private readonly healthService: HealthService) {}

  @Get()
  @ApiOperation({ summary: 'Service metadata' })
  @ApiResponse({ status: 200, description: 'Service metadata', schema: SERVICE_INFO_SCHEMA })
  public getServiceInfo(): ServiceInfo {
    return this.healthService.getServiceInfo();
  }
}
