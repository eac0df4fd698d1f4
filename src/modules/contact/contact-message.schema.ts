import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import {
  EMAIL_PATTERN,
  serializeDocument,
} from '../../common/schemas/serialize-document';

export type ContactMessageDocument = HydratedDocument<ContactMessage>;

@Schema({
  timestamps: true,
  collection: 'contactmessage',
  toJSON: {
    virtuals: true,
    transform: serializeDocument,
  },
})
export class ContactMessage {
  @Prop({ required: true, trim: true, maxlength: 255 })
  name!: string;

  @Prop({
    required: true,
    trim: true,
    lowercase: true,
    match: EMAIL_PATTERN,
  })
  email!: string;

  @Prop({ required: true, trim: true, maxlength: 255 })
  subject!: string;

  @Prop({ required: true, trim: true, minlength: 5, maxlength: 5000 })
  message!: string;
}

export const ContactMessageSchema =
  SchemaFactory.createForClass(ContactMessage);
