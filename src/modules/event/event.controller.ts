import { Controller, Get } from '@nestjs/common';
import { StoredRecord } from '../store/interfaces/document-store.interface';
import { EventService } from './event.service';
import { Event } from './event.schema';

/**
 * EventController
 *
 * Endpoints:
 * - GET /api/events - List events ordered by date
 */
@Controller('events')
export class EventController {
  constructor(private readonly eventService: EventService) {}

  @Get()
  async listEvents(): Promise<StoredRecord<Event>[]> {
    return this.eventService.listEvents();
  }
}
