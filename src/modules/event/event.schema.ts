import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import { serializeDocument } from '../../common/schemas/serialize-document';

export type EventDocument = HydratedDocument<Event>;

/**
 * A show on the theater's program.
 *
 * `seats_available` is only ever changed by the reservation decrement
 * (and by seeding); it stays within `0..seats_total`.
 */
@Schema({
  timestamps: true,
  collection: 'event',
  toJSON: {
    virtuals: true,
    transform: serializeDocument,
  },
})
export class Event {
  @Prop({
    required: true,
    trim: true,
    maxlength: 255,
  })
  title!: string;

  @Prop({
    required: true,
    trim: true,
    maxlength: 5000,
  })
  description!: string;

  // e.g. Kabarett, Impro, Workshop
  @Prop({
    required: true,
    trim: true,
    maxlength: 100,
    index: true,
  })
  genre!: string;

  // Event start
  @Prop({
    required: true,
    type: Date,
  })
  date!: Date;

  @Prop({
    required: true,
    min: 10,
    max: 300,
    validate: {
      validator: Number.isInteger,
      message: 'duration_minutes must be an integer',
    },
  })
  duration_minutes!: number;

  @Prop({
    required: true,
    min: 0,
  })
  price_eur!: number;

  @Prop({
    required: true,
    min: 1,
    validate: {
      validator: Number.isInteger,
      message: 'seats_total must be an integer',
    },
  })
  seats_total!: number;

  @Prop({
    required: true,
    min: 0,
    validate: {
      validator: function (this: Event, value: number) {
        return Number.isInteger(value) && value <= this.seats_total;
      },
      message: 'seats_available must be an integer not greater than seats_total',
    },
  })
  seats_available!: number;

  @Prop({
    required: false,
    trim: true,
    maxlength: 2048,
  })
  image_url?: string;
}

export const EventSchema = SchemaFactory.createForClass(Event);

EventSchema.index({ date: 1 });
