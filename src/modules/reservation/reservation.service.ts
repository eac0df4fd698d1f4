import {
  BadRequestException,
  ConflictException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { Types } from 'mongoose';

import { DOCUMENT_STORE } from '../store/store.constants';
import {
  DocumentStore,
  StoredRecord,
} from '../store/interfaces/document-store.interface';
import { Event } from '../event/event.schema';
import { CreateReservationDto } from './dto';
import { ReservationResponse } from './interfaces';

/**
 * ReservationService books tickets for an event
 *
 * Flow:
 * 1. Look up the event (404 if missing)
 * 2. Fast-path capacity check against the value just read
 * 3. Atomic conditional decrement of seats_available
 * 4. Record the reservation
 *
 * Seats are decremented before the reservation is written, so a failure
 * in between leaves seats consumed without a reservation, never the
 * reverse. Nothing here retries.
 */
@Injectable()
export class ReservationService {
  private readonly logger = new Logger(ReservationService.name);

  constructor(
    @Inject(DOCUMENT_STORE)
    private readonly store: DocumentStore,
  ) {}

  /**
   * Reserve tickets for an event
   *
   * @returns id of the new reservation
   * @throws NotFoundException if the event does not exist
   * @throws BadRequestException if the event has fewer seats than requested
   * @throws ConflictException if a concurrent reservation took the seats
   */
  async reserve(dto: CreateReservationDto): Promise<ReservationResponse> {
    const event = await this.findEvent(dto.event_id);

    // Step 2: reject against the value just read
    if (event.seats_available < dto.tickets) {
      throw new BadRequestException({
        statusCode: 400,
        errorCode: 'INSUFFICIENT_CAPACITY',
        message: 'Not enough seats available',
        details: {
          seats_available: event.seats_available,
          tickets_requested: dto.tickets,
        },
        timestamp: new Date().toISOString(),
      });
    }

    // Step 3: match and decrement in one storage operation
    const updated = await this.store.conditionalUpdate(
      'event',
      { _id: event.id, seats_available: { $gte: dto.tickets } },
      {
        $inc: { seats_available: -dto.tickets },
        $set: { updatedAt: new Date() },
      },
    );

    if (!updated) {
      throw new ConflictException({
        statusCode: 409,
        errorCode: 'SEATS_NO_LONGER_AVAILABLE',
        message: 'Seats no longer available',
        timestamp: new Date().toISOString(),
      });
    }

    // Step 4: record the reservation; a failure here is not rolled back
    let reservationId: string;
    try {
      reservationId = await this.store.create('reservation', {
        event_id: event.id,
        name: dto.name,
        email: dto.email,
        tickets: dto.tickets,
        note: dto.note,
      });
    } catch (error) {
      this.logger.error(
        `Seats decremented but reservation not recorded: event=${event.id} tickets=${dto.tickets} email=${dto.email}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      throw error;
    }

    this.logger.log(
      `Reserved ${dto.tickets} tickets for event ${event.id} (reservation ${reservationId}, ${updated.seats_available} seats left)`,
    );

    return {
      reservation_id: reservationId,
      message: 'Reservation confirmed',
    };
  }

  private async findEvent(eventId: string): Promise<StoredRecord<Event>> {
    const event = Types.ObjectId.isValid(eventId)
      ? await this.store.findOne('event', { _id: eventId })
      : null;

    if (!event) {
      throw new NotFoundException({
        statusCode: 404,
        errorCode: 'EVENT_NOT_FOUND',
        message: 'Event not found',
        timestamp: new Date().toISOString(),
      });
    }

    return event;
  }
}
