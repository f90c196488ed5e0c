import { Controller, Get, Inject, HttpStatus, HttpCode } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { PayloadStore } from '../../../core';
import {
  ApiHealthCheck,
  ApiReadinessCheck,
  HealthResponseDto,
  ReadinessResponseDto,
} from '../../../_shared';
import { PAYLOAD_STORE } from '../constants';
import { ConfigurationService } from '../services/configuration.service';

/**
 * Health Controller
 * `/health` never touches the store; `/health/ready` reports on it
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(PAYLOAD_STORE)
    private readonly store: PayloadStore,
    private readonly configuration: ConfigurationService,
  ) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  health(): HealthResponseDto {
    return { status: 'ok' };
  }

  @Get('ready')
  @HttpCode(HttpStatus.OK)
  @ApiReadinessCheck()
  async readiness(): Promise<ReadinessResponseDto> {
    const storeHealthy = await this.store.isHealthy();

    return {
      status: storeHealthy ? 'ready' : 'not_ready',
      checks: {
        store: storeHealthy,
      },
      details: {
        storage: this.configuration.getStorageType(),
      },
    };
  }
}
