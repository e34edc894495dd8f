import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';

import { HealthService } from './health.service';
import type { AppHealthStatus } from './health.types';
import { APP_HEALTH_STATUS_SCHEMA } from '../api/swagger/api-schemas';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  public constructor(private readonly healthService: HealthService) {}

  @Get()
  @ApiOperation({ summary: 'Database reachability and scheduler state' })
  @ApiResponse({ status: 200, description: 'Health status', schema: APP_HEALTH_STATUS_SCHEMA })
  public async getHealthStatus(): Promise<AppHealthStatus> {
    return this.healthService.getHealthStatus();
  }
}
