import { Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { SeedResult, SeedService } from './seed.service';

/**
 * Endpoints:
 * - POST /api/seed - Populate demo content (no-op if events exist)
 */
@Controller('seed')
export class SeedController {
  constructor(private readonly seedService: SeedService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async seed(): Promise<SeedResult> {
    return this.seedService.seed();
  }
}
