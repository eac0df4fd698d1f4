import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import { serializeDocument } from '../../common/schemas/serialize-document';

export type OwnerProfileDocument = HydratedDocument<OwnerProfile>;

@Schema({
  timestamps: true,
  collection: 'ownerprofile',
  toJSON: {
    virtuals: true,
    transform: serializeDocument,
  },
})
export class OwnerProfile {
  @Prop({ required: true, trim: true, maxlength: 255 })
  name!: string;

  // Role at the theater
  @Prop({ required: true, trim: true, maxlength: 255 })
  role!: string;

  @Prop({ required: true, trim: true, maxlength: 5000 })
  bio!: string;

  @Prop({ required: false, trim: true, maxlength: 2048 })
  image_url?: string;

  @Prop({ required: false, trim: true, maxlength: 2048 })
  instagram?: string;

  @Prop({ required: false, trim: true, maxlength: 2048 })
  website?: string;
}

export const OwnerProfileSchema = SchemaFactory.createForClass(OwnerProfile);
