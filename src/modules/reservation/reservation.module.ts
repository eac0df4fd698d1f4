import { Module } from '@nestjs/common';
import { ReservationController } from './reservation.controller';
import { ReservationService } from './reservation.service';

/**
 * ReservationModule handles ticket reservations
 *
 * Dependencies:
 * - StoreModule (global): DocumentStore with atomic conditional update
 */
@Module({
  controllers: [ReservationController],
  providers: [ReservationService],
  exports: [ReservationService],
})
export class ReservationModule {}
