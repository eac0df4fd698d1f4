import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import {
  EMAIL_PATTERN,
  serializeDocument,
} from '../../common/schemas/serialize-document';

export type ReservationDocument = HydratedDocument<Reservation>;

/**
 * A confirmed ticket reservation. Written once, after the event's seats
 * have been decremented, and never modified afterwards.
 */
@Schema({
  timestamps: true,
  collection: 'reservation',
  toJSON: {
    virtuals: true,
    transform: serializeDocument,
  },
})
export class Reservation {
  // Weak reference to Event: looked up at reservation time only
  @Prop({
    required: true,
    type: String,
    index: true,
  })
  event_id!: string;

  @Prop({
    required: true,
    trim: true,
    maxlength: 255,
  })
  name!: string;

  @Prop({
    required: true,
    trim: true,
    lowercase: true,
    match: EMAIL_PATTERN,
  })
  email!: string;

  @Prop({
    required: true,
    min: 1,
    max: 10,
    validate: {
      validator: Number.isInteger,
      message: 'tickets must be an integer',
    },
  })
  tickets!: number;

  // Seating preference or other remarks
  @Prop({
    required: false,
    trim: true,
    maxlength: 1000,
  })
  note?: string;
}

export const ReservationSchema = SchemaFactory.createForClass(Reservation);

ReservationSchema.index({ event_id: 1, createdAt: -1 });
