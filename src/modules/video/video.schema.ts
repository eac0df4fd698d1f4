import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import { serializeDocument } from '../../common/schemas/serialize-document';
import { MONTH_KEY_PATTERN } from './month-key';

export type VideoDocument = HydratedDocument<Video>;

/**
 * Background video shown on the website for a given month.
 */
@Schema({
  timestamps: true,
  collection: 'video',
  toJSON: {
    virtuals: true,
    transform: serializeDocument,
  },
})
export class Video {
  // "YYYY-MM"
  @Prop({
    required: true,
    trim: true,
    match: MONTH_KEY_PATTERN,
    index: true,
  })
  month_key!: string;

  @Prop({ required: true, trim: true, maxlength: 2048 })
  video_url!: string;

  @Prop({ required: false, trim: true, maxlength: 500 })
  caption?: string;
}

export const VideoSchema = SchemaFactory.createForClass(Video);

VideoSchema.index({ createdAt: -1 });
