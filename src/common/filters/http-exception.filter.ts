import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ErrorResponse } from '../interfaces/base-response.interface';

type ErrorDescription = Pick<ErrorResponse, 'statusCode' | 'errorCode' | 'message' | 'details'>;

// Used when an HttpException carries no errorCode of its own
const DEFAULT_ERROR_CODES: Record<number, string> = {
  400: 'BAD_REQUEST',
  404: 'NOT_FOUND',
  409: 'CONFLICT',
  500: 'INTERNAL_ERROR',
  503: 'SERVICE_UNAVAILABLE',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMessage(value: unknown): value is string | string[] {
  return (
    typeof value === 'string' ||
    (Array.isArray(value) && value.every((item) => typeof item === 'string'))
  );
}

/**
 * Global exception filter
 *
 * Every failure leaves the API as
 * `{ statusCode, errorCode, message, timestamp, path, details? }`.
 * Services throw HttpExceptions whose body already names the errorCode
 * (EVENT_NOT_FOUND, SEATS_NO_LONGER_AVAILABLE, STORE_UNAVAILABLE, ...);
 * anything else is reported as a 500 without its message.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const error = this.describe(exception);

    if (exception instanceof HttpException && error.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.warn(`${request.method} ${request.url} -> ${error.statusCode} ${error.errorCode}`);
    }

    const body: ErrorResponse = {
      statusCode: error.statusCode,
      errorCode: error.errorCode,
      message: error.message,
      timestamp: new Date().toISOString(),
      path: request.url,
      ...(error.details && { details: error.details }),
    };

    response.status(error.statusCode).json(body);
  }

  private describe(exception: unknown): ErrorDescription {
    if (exception instanceof HttpException) {
      const statusCode = exception.getStatus();
      const payload = exception.getResponse();

      if (!isRecord(payload)) {
        return {
          statusCode,
          errorCode: DEFAULT_ERROR_CODES[statusCode] ?? 'UNKNOWN_ERROR',
          message: String(payload),
        };
      }

      return {
        statusCode,
        errorCode:
          typeof payload.errorCode === 'string'
            ? payload.errorCode
            : (DEFAULT_ERROR_CODES[statusCode] ?? 'UNKNOWN_ERROR'),
        message: isMessage(payload.message) ? payload.message : exception.message,
        details: isRecord(payload.details) ? payload.details : undefined,
      };
    }

    if (exception instanceof Error) {
      this.logger.error(`Unhandled exception: ${exception.message}`, exception.stack);
      return {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        errorCode: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      };
    }

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      errorCode: 'UNKNOWN_ERROR',
      message: 'An unknown error occurred',
    };
  }
}
