import { Event } from '../../src/modules/event/event.schema';
import { CreateReservationDto } from '../../src/modules/reservation/dto';

export function buildEvent(overrides: Partial<Event> = {}): Event {
  return {
    title: 'Test Show',
    description: 'A show used in tests',
    date: new Date('2030-05-01T19:30:00.000Z'),
    duration_minutes: 90,
    price_eur: 20,
    genre: 'Kabarett',
    seats_total: 50,
    seats_available: 50,
    ...overrides,
  };
}

export function buildReservation(
  eventId: string,
  tickets: number,
  overrides: Partial<CreateReservationDto> = {},
): CreateReservationDto {
  return {
    event_id: eventId,
    name: 'Test Guest',
    email: 'guest@example.com',
    tickets,
    ...overrides,
  };
}
