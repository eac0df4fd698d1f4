import { Controller, Get } from '@nestjs/common';
import { HealthService, HealthCheckResult } from './health.service';

/**
 * HealthController provides health check endpoints
 * Served outside the /api prefix.
 *
 * Endpoints:
 * - GET /health - Full check with MongoDB diagnostics
 * - GET /health/live - Liveness check (app is running)
 * - GET /health/ready - Readiness check (MongoDB connected)
 */
@Controller('health')
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  @Get()
  async check(): Promise<HealthCheckResult> {
    return this.healthService.check();
  }

  @Get('live')
  live(): { status: string } {
    return { status: 'ok' };
  }

  @Get('ready')
  ready(): { status: 'ready' | 'not_ready' } {
    return { status: this.healthService.isReady() ? 'ready' : 'not_ready' };
  }
}
