import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import {
  HealthCheck,
  HealthCheckResult,
  HealthCheckService,
  MemoryHealthIndicator,
} from '@nestjs/terminus';
import type { Environment } from '../../../config/environment.schema';

export interface LivenessResponse {
  status: 'healthy';
  timestamp: string;
  uptime: number;
  version: string;
  environment: string;
}

const HEAP_LIMIT_BYTES = 512 * 1024 * 1024;
const RSS_LIMIT_BYTES = 1024 * 1024 * 1024;

/**
 * Health Controller
 *
 * Not versioned; the pipeline stages still run, so responses carry a
 * correlation ID like every other endpoint.
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  private readonly startTime = Date.now();

  constructor(
    private readonly health: HealthCheckService,
    private readonly memory: MemoryHealthIndicator,
    private readonly config: ConfigService<Environment, true>,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Liveness check' })
  @ApiResponse({ status: 200, description: 'Application is alive' })
  getLiveness(): LivenessResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      version: process.env.npm_package_version ?? 'unknown',
      environment: this.config.get('NODE_ENV', { infer: true }),
    };
  }

  @Get('memory')
  @HealthCheck()
  @ApiOperation({
    summary: 'Memory health indicators',
    description: 'Heap below 512 MB and RSS below 1 GB; 503 when a threshold is exceeded',
  })
  checkMemory(): Promise<HealthCheckResult> {
    return this.health.check([
      () => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES),
      () => this.memory.checkRSS('memory_rss', RSS_LIMIT_BYTES),
    ]);
  }
}
