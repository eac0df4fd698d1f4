import { Controller, Get } from '@nestjs/common';
import { StoredRecord } from '../store/interfaces/document-store.interface';
import { TheaterService } from './theater.service';
import { Theater } from './theater.schema';

/**
 * Endpoints:
 * - GET /api/theater - Current theater information (empty body if none)
 */
@Controller('theater')
export class TheaterController {
  constructor(private readonly theaterService: TheaterService) {}

  @Get()
  async getTheater(): Promise<StoredRecord<Theater> | null> {
    return this.theaterService.getLatestTheater();
  }
}
