/**
 * Database Seeder Script
 *
 * Populates an empty database with the demo theater, owners, events and
 * the current month's video. Does nothing if events already exist.
 *
 * Usage: npm run seed
 *
 * Environment Variables:
 * - MONGO_URI: MongoDB connection string (from .env file)
 */
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { SeedService } from '../modules/seed/seed.service';

const logger = new Logger('Seeder');

async function seed(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule);

  try {
    const result = await app.get(SeedService).seed();
    logger.log(result.message);
  } finally {
    await app.close();
  }
}

seed()
  .then(() => {
    logger.log('Seeder finished');
    process.exit(0);
  })
  .catch((error: unknown) => {
    logger.error(
      `Seeder failed: ${error instanceof Error ? error.message : String(error)}`,
    );
    process.exit(1);
  });
