import {
  BadRequestException,
  ValidationError,
  ValidationPipe,
} from '@nestjs/common';

/**
 * Flatten class-validator errors into `{ field: [messages] }`,
 * using dotted paths for nested properties.
 */
export function collectConstraintMessages(
  errors: ValidationError[],
  parentPath = '',
): Record<string, string[]> {
  const result: Record<string, string[]> = {};

  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;

    if (error.constraints) {
      result[path] = Object.values(error.constraints);
    }

    if (error.children && error.children.length > 0) {
      Object.assign(result, collectConstraintMessages(error.children, path));
    }
  }

  return result;
}

/**
 * Global validation pipe.
 * Rejects malformed bodies with a VALIDATION_ERROR before any handler runs.
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    transform: true, // Automatically transform payloads to DTO instances
    whitelist: true, // Strip properties not in DTO
    forbidNonWhitelisted: true, // Throw error for unknown properties
    transformOptions: {
      enableImplicitConversion: true,
    },
    exceptionFactory: (errors: ValidationError[]) =>
      new BadRequestException({
        statusCode: 400,
        errorCode: 'VALIDATION_ERROR',
        message: 'Request validation failed',
        details: collectConstraintMessages(errors),
        timestamp: new Date().toISOString(),
      }),
  });
}
