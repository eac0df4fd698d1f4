import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ReservationService } from './reservation.service';
import { CreateReservationDto } from './dto';
import { ReservationResponse } from './interfaces';

/**
 * ReservationController handles ticket reservations
 *
 * Endpoints:
 * - POST /api/reservations - Reserve tickets for an event
 */
@Controller('reservations')
export class ReservationController {
  constructor(private readonly reservationService: ReservationService) {}

  /**
   * Reserve tickets for an event
   *
   * @example
   * POST /api/reservations
   * Body: { "event_id": "64a7b8c9d0e1f2a3b4c5d6e7", "name": "Anna Gruber", "email": "anna@example.com", "tickets": 2 }
   *
   * Response 201: { "reservation_id": "64a7b8c9d0e1f2a3b4c5d6e8", "message": "Reservation confirmed" }
   *
   * Error 400: Validation failed, or not enough seats available
   * Error 404: Event not found
   * Error 409: Seats taken by a concurrent reservation
   * Error 503: Document store unavailable
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  async reserve(
    @Body() dto: CreateReservationDto,
  ): Promise<ReservationResponse> {
    return this.reservationService.reserve(dto);
  }
}
