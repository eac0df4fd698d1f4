import { INestApplication, RequestMethod } from '@nestjs/common';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { createValidationPipe } from './common/pipes/validation.pipe';

export const API_PREFIX = 'api';

/**
 * Apply the global prefix, exception filter and validation pipe.
 */
export function configureApp(app: INestApplication): void {
  // Health checks stay at /health
  app.setGlobalPrefix(API_PREFIX, {
    exclude: [
      { path: 'health', method: RequestMethod.GET },
      { path: 'health/live', method: RequestMethod.GET },
      { path: 'health/ready', method: RequestMethod.GET },
    ],
  });

  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalPipes(createValidationPipe());
}
