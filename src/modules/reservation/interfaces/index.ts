export * from './reservation-response.interface';
