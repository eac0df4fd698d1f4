export * from './create-reservation.dto';
