/**
 * Error response interface
 */
export interface ErrorResponse {
  statusCode: number;
  errorCode: string;
  message: string | string[];
  timestamp: string;
  path: string;
  details?: Record<string, unknown>;
}
