import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import {
  EMAIL_PATTERN,
  serializeDocument,
} from '../../common/schemas/serialize-document';

export type TheaterDocument = HydratedDocument<Theater>;

/**
 * Venue information. Several versions may be stored; the most recently
 * created one is the one shown.
 */
@Schema({
  timestamps: true,
  collection: 'theater',
  toJSON: {
    virtuals: true,
    transform: serializeDocument,
  },
})
export class Theater {
  @Prop({ required: true, trim: true, maxlength: 255 })
  name!: string;

  @Prop({ required: true, trim: true, maxlength: 500 })
  tagline!: string;

  // History / story of the theater
  @Prop({ required: true, trim: true, maxlength: 10000 })
  story!: string;

  @Prop({ required: true, trim: true, maxlength: 500 })
  address!: string;

  @Prop({ required: true, trim: true, maxlength: 50 })
  phone!: string;

  @Prop({
    required: true,
    trim: true,
    lowercase: true,
    match: EMAIL_PATTERN,
  })
  email!: string;

  @Prop({ required: false, trim: true, maxlength: 255 })
  opening_hours?: string;

  @Prop({ required: false, trim: true, maxlength: 1000 })
  transport_howto?: string;
}

export const TheaterSchema = SchemaFactory.createForClass(Theater);

TheaterSchema.index({ createdAt: -1 });
