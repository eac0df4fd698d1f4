import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import { AppController } from './app.controller';

// Feature modules
import { StoreModule } from './modules/store/store.module';
import { HealthModule } from './modules/health/health.module';
import { EventModule } from './modules/event/event.module';
import { ReservationModule } from './modules/reservation/reservation.module';
import { OwnerModule } from './modules/owner/owner.module';
import { TheaterModule } from './modules/theater/theater.module';
import { ContactModule } from './modules/contact/contact.module';
import { VideoModule } from './modules/video/video.module';
import { SeedModule } from './modules/seed/seed.module';

/**
 * AppModule - Root module of the theater API
 *
 * Configuration:
 * - ConfigModule: Global configuration with .env support
 * - MongooseModule: MongoDB connection via MONGO_URI
 *
 * Feature Modules:
 * - StoreModule: DocumentStore over the mongoose models (global)
 * - EventModule: Event listing
 * - ReservationModule: Ticket reservations with atomic seat decrement
 * - OwnerModule, TheaterModule, VideoModule: Site content
 * - ContactModule: Contact form
 * - SeedModule: Demo content
 * - HealthModule: Liveness and readiness checks
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
    }),

    MongooseModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        uri: configService.get<string>(
          'MONGO_URI',
          'mongodb://localhost:27017/cabaret-theater',
        ),
        serverSelectionTimeoutMS: Number(
          configService.get<string>('MONGO_SERVER_SELECTION_TIMEOUT_MS', '5000'),
        ),
      }),
      inject: [ConfigService],
    }),

    StoreModule,
    HealthModule,
    EventModule,
    ReservationModule,
    OwnerModule,
    TheaterModule,
    ContactModule,
    VideoModule,
    SeedModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
