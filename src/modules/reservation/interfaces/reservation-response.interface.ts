/**
 * Response interface for the reserve operation
 */
export interface ReservationResponse {
  reservation_id: string;
  message: string;
}
