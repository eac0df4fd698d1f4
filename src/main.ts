import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { API_PREFIX, configureApp } from './app.setup';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create(AppModule);

  const configService = app.get(ConfigService);

  // Configure CORS with environment-based origins
  const corsOrigins = configService.get<string>('CORS_ORIGINS', '');
  const allowedOrigins = corsOrigins
    ? corsOrigins.split(',').map((origin) => origin.trim())
    : [];

  const nodeEnv = configService.get<string>('NODE_ENV', 'development');
  const isDevelopment = nodeEnv === 'development';

  app.enableCors({
    origin: isDevelopment
      ? true // Allow all origins in development
      : allowedOrigins.length > 0
        ? allowedOrigins
        : false,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  });

  if (!isDevelopment && allowedOrigins.length === 0) {
    logger.warn(
      'CORS_ORIGINS not configured for production. CORS is disabled.',
    );
  } else if (!isDevelopment) {
    logger.log(`CORS enabled for origins: ${allowedOrigins.join(', ')}`);
  }

  configureApp(app);

  if (!isDevelopment && !configService.get<string>('MONGO_URI')) {
    logger.error('Missing required environment variable: MONGO_URI');
    await app.close();
    process.exit(1);
  }

  const port = Number(configService.get<string>('PORT', '3000'));

  await app.listen(port);

  logger.log(`Application is running on: http://localhost:${port}/${API_PREFIX}`);
  logger.log(`Environment: ${nodeEnv}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
