import { Module } from '@nestjs/common';
import { EventController } from './event.controller';
import { EventService } from './event.service';

/**
 * EventModule handles the event listing
 *
 * Dependencies:
 * - StoreModule (global): DocumentStore
 */
@Module({
  controllers: [EventController],
  providers: [EventService],
  exports: [EventService],
})
export class EventModule {}
