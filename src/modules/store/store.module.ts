import { Global, Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';

import { Event, EventSchema } from '../event/event.schema';
import { Reservation, ReservationSchema } from '../reservation/reservation.schema';
import { OwnerProfile, OwnerProfileSchema } from '../owner/owner-profile.schema';
import { Theater, TheaterSchema } from '../theater/theater.schema';
import {
  ContactMessage,
  ContactMessageSchema,
} from '../contact/contact-message.schema';
import { Video, VideoSchema } from '../video/video.schema';
import { DocumentStoreService } from './document-store.service';
import { DOCUMENT_STORE } from './store.constants';

/**
 * StoreModule provides the DocumentStore used by every feature module
 * Marked as @Global() so it can be used across all modules without importing
 *
 * Feature services depend on the DOCUMENT_STORE token only; tests bind an
 * in-process store to the same token.
 */
@Global()
@Module({
  imports: [
    MongooseModule.forFeature([
      { name: Event.name, schema: EventSchema },
      { name: Reservation.name, schema: ReservationSchema },
      { name: OwnerProfile.name, schema: OwnerProfileSchema },
      { name: Theater.name, schema: TheaterSchema },
      { name: ContactMessage.name, schema: ContactMessageSchema },
      { name: Video.name, schema: VideoSchema },
    ]),
  ],
  providers: [
    {
      provide: DOCUMENT_STORE,
      useClass: DocumentStoreService,
    },
  ],
  exports: [DOCUMENT_STORE],
})
export class StoreModule {}
